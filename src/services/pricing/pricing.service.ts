import type { BookingMeta, PriceQuote } from '@core/interfaces/booking.types.js';

import { type ExchangeRateCache, getExchangeRateCache } from './exchange-rate.cache.js';

export const DEFAULT_BASE_PRICE = 50;

/** USD list prices. */
export const BASE_PRICES: Readonly<Record<string, number>> = {
  spa: 50,
  salon: 40,
  doctor: 100,
  'head spa': 60,
  facial: 27,
  dental: 80,
  hotel: 150,
  travel: 80,
  appointment: 30,
  flight: 200,
};

const INDIAN_CITIES = new Set([
  'bangalore',
  'bengaluru',
  'delhi',
  'mumbai',
  'chennai',
  'hyderabad',
  'vijayawada',
  'mangalagiri',
  'kolkata',
  'pune',
  'ahmedabad',
]);

const GOLD_BONUS = 5;

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function discountFor(confidencePct: number, meta: BookingMeta = {}): number {
  let discount = 0;
  if (confidencePct >= 90) discount = 15;
  else if (confidencePct >= 75) discount = 10;
  else if (confidencePct >= 50) discount = 5;
  if (meta.loyaltyTier === 'gold') discount += GOLD_BONUS;
  return discount;
}

export function currencyFor(meta: BookingMeta = {}, location?: string | null): string {
  if (typeof meta.currency === 'string' && meta.currency.trim()) {
    return meta.currency.trim().toUpperCase();
  }
  if (location && INDIAN_CITIES.has(location.toLowerCase())) return 'INR';
  return 'USD';
}

export class PricingService {
  constructor(private readonly rates: ExchangeRateCache = getExchangeRateCache()) {}

  basePrice(service: string): number {
    return Object.prototype.hasOwnProperty.call(BASE_PRICES, service) ? BASE_PRICES[service] : DEFAULT_BASE_PRICE;
  }

  async calculatePrice(
    service: string,
    confidencePct: number,
    meta: BookingMeta = {},
    location?: string | null,
  ): Promise<PriceQuote> {
    const discountPercent = discountFor(confidencePct, meta);
    const usd = round2(this.basePrice(service) * (1 - discountPercent / 100));
    const currency = currencyFor(meta, location);

    if (currency === 'USD') {
      return { amount: usd, discountPercent, currency };
    }
    const rate = await this.rates.getRate(currency);
    return { amount: round2(usd * rate), discountPercent, currency };
  }
}
