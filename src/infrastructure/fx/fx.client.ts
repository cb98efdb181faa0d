import axios from 'axios';
import { z } from 'zod';

import { config } from '@config/env.config';

const LatestRatesSchema = z.object({
  rates: z.record(z.number()),
});

export type RatesFetcher = () => Promise<Record<string, number>>;

/** USD-based rates from the configured exchange-rate API. */
export const fetchUsdRates: RatesFetcher = async () => {
  const { data } = await axios.get<unknown>(`${config.FX_API_URL}/latest/USD`, {
    timeout: 3000,
    params: config.FX_API_KEY ? { apikey: config.FX_API_KEY } : undefined,
  });
  return LatestRatesSchema.parse(data).rates;
};
