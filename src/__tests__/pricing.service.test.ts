import { describe, expect, it, vi } from 'vitest';

import { ExchangeRateCache } from '@services/pricing/exchange-rate.cache.js';
import { PricingService, currencyFor, discountFor } from '@services/pricing/pricing.service.js';

const staticCache = () => new ExchangeRateCache(null, { USD: 1, INR: 82 });

describe('PricingService', () => {
  it('converts to INR for Indian cities', async () => {
    const pricing = new PricingService(staticCache());
    await expect(pricing.calculatePrice('facial', 76, {}, 'vijayawada')).resolves.toEqual({
      amount: 1992.6,
      discountPercent: 10,
      currency: 'INR',
    });
  });

  it.each([
    [95, 15, 42.5],
    [90, 15, 42.5],
    [75, 10, 45],
    [50, 5, 47.5],
    [49.9, 0, 50],
  ])('prices spa at %s%% confidence with a %s%% discount', async (confidence, discount, amount) => {
    const pricing = new PricingService(staticCache());
    await expect(pricing.calculatePrice('spa', confidence)).resolves.toEqual({
      amount,
      discountPercent: discount,
      currency: 'USD',
    });
  });

  it('adds the gold loyalty bonus', async () => {
    const pricing = new PricingService(staticCache());
    const quote = await pricing.calculatePrice('salon', 80, { loyaltyTier: 'gold' });
    expect(quote).toEqual({ amount: 34, discountPercent: 15, currency: 'USD' });
  });

  it('uses the default base price for unknown services', async () => {
    const pricing = new PricingService(staticCache());
    await expect(pricing.calculatePrice('yoga', 0)).resolves.toEqual({
      amount: 50,
      discountPercent: 0,
      currency: 'USD',
    });
  });

  it('honours an explicit currency over the location', async () => {
    const pricing = new PricingService(staticCache());
    const quote = await pricing.calculatePrice('doctor', 95, { currency: 'inr' }, 'paris');
    expect(quote).toEqual({ amount: 6970, discountPercent: 15, currency: 'INR' });
  });

  it('keeps the USD amount for currencies without a rate', async () => {
    const pricing = new PricingService(staticCache());
    const quote = await pricing.calculatePrice('spa', 95, { currency: 'EUR' });
    expect(quote).toEqual({ amount: 42.5, discountPercent: 15, currency: 'EUR' });
  });
});

describe('ExchangeRateCache', () => {
  it('fetches live rates once', async () => {
    const fetcher = vi.fn(async () => ({ USD: 1, INR: 83.5 }));
    const cache = new ExchangeRateCache(fetcher, { USD: 1, INR: 82 });

    expect(await cache.getRate('INR')).toBe(83.5);
    expect(await cache.getRate('inr')).toBe(83.5);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('falls back to the static rate when the fetch fails', async () => {
    const fetcher = vi.fn(async (): Promise<Record<string, number>> => {
      throw new Error('network down');
    });
    const cache = new ExchangeRateCache(fetcher, { USD: 1, INR: 82 });

    expect(await cache.getRate('INR')).toBe(82);
  });

  it('returns 1 for USD without loading rates', async () => {
    const fetcher = vi.fn(async () => ({ INR: 83 }));
    const cache = new ExchangeRateCache(fetcher);

    expect(await cache.getRate('USD')).toBe(1);
    expect(fetcher).not.toHaveBeenCalled();
  });
});

describe('pricing helpers', () => {
  it('picks the currency from meta, then location', () => {
    expect(currencyFor({ currency: ' gbp ' }, 'delhi')).toBe('GBP');
    expect(currencyFor({}, 'Bengaluru')).toBe('INR');
    expect(currencyFor({}, 'london')).toBe('USD');
    expect(currencyFor()).toBe('USD');
  });

  it('stacks the gold bonus on the tier discount', () => {
    expect(discountFor(10, { loyaltyTier: 'gold' })).toBe(5);
    expect(discountFor(92, { loyaltyTier: 'silver' })).toBe(15);
  });
});
