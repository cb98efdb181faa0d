import { config } from '@config/env.config';

import { type RatesFetcher, fetchUsdRates } from '@infra/fx/fx.client.js';

import { tryEnrich } from '@services/enrichment/capability.js';

import { logger } from '@utils/logger.js';

export type RateTable = Record<string, number>;

export function staticRates(): RateTable {
  return { USD: 1, INR: config.FX_DEFAULT_INR_RATE };
}

/**
 * USD → currency rates, loaded at most once per instance. Without a fetcher
 * (no FX_API_KEY) only the static table is used.
 */
export class ExchangeRateCache {
  private rates: Promise<RateTable> | null = null;

  constructor(
    private readonly fetcher: RatesFetcher | null = config.FX_API_KEY ? fetchUsdRates : null,
    private readonly fallback: RateTable = staticRates(),
  ) {}

  async getRate(code: string): Promise<number> {
    const currency = code.toUpperCase();
    if (currency === 'USD') return 1;

    const rates = await this.load();
    const rate = Object.prototype.hasOwnProperty.call(rates, currency) ? rates[currency] : undefined;
    if (rate === undefined || !(rate > 0)) {
      logger.warn('[pricing] no exchange rate, using 1', { currency });
      return 1;
    }
    return rate;
  }

  private load(): Promise<RateTable> {
    if (!this.rates) {
      this.rates = this.fetchRates();
    }
    return this.rates;
  }

  private async fetchRates(): Promise<RateTable> {
    const fetcher = this.fetcher;
    if (!fetcher) return { ...this.fallback };
    const result = await tryEnrich('fx-rates', () => fetcher(), () => ({}));
    return { ...this.fallback, ...result.value };
  }
}

let shared: ExchangeRateCache | undefined;

export function getExchangeRateCache(): ExchangeRateCache {
  if (!shared) shared = new ExchangeRateCache();
  return shared;
}
