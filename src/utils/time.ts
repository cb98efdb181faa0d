import { DateTime } from 'luxon';

import { config } from '@config/env.config';

export function todayISO(tz: string = config.TIMEZONE): string {
  return DateTime.now().setZone(tz).toFormat('yyyy-LL-dd');
}

export function addDaysISO(dayISO: string, days: number): string {
  const dt = DateTime.fromISO(dayISO, { zone: 'utc' });
  if (!dt.isValid) throw new Error('Invalid ISO date: ' + dayISO);
  return dt.plus({ days }).toFormat('yyyy-LL-dd');
}

export function isISODate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function formatDisplayDate(dayISO: string): string {
  const dt = DateTime.fromISO(dayISO, { zone: 'utc', locale: 'en-US' });
  return dt.isValid ? dt.toFormat('cccc, dd LLL yyyy') : dayISO;
}

export function utcNowISO(): string {
  return DateTime.utc().toISO() ?? new Date().toISOString();
}
