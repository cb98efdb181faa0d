import { DateTime } from 'luxon';

import { addDaysISO } from '@utils/time.js';

import { containsPhrase } from './text.match.js';

const SLASH_DATE = /(\d{1,2}\/\d{1,2}\/\d{2,4})/;
const ISO_DATE = /(\d{4}-\d{1,2}-\d{1,2})/;

function strict(value: string, format: string): string | undefined {
  const dt = DateTime.fromFormat(value, format, { zone: 'utc' });
  return dt.isValid ? dt.toFormat('yyyy-LL-dd') : undefined;
}

/**
 * Resolves "today", "tomorrow", dd/mm/yyyy, dd/mm/yy and yyyy-mm-dd against
 * `referenceToday` (yyyy-MM-dd). First match wins; malformed literals are a no-match.
 */
export function parseDate(text: string, referenceToday: string): string | undefined {
  const s = text.toLowerCase();
  if (containsPhrase(s, 'today')) return referenceToday;
  if (containsPhrase(s, 'tomorrow')) return addDaysISO(referenceToday, 1);

  const slash = SLASH_DATE.exec(s);
  if (slash) {
    const year = slash[1].split('/')[2];
    const format = year.length === 4 ? 'd/M/yyyy' : year.length === 2 ? 'd/M/yy' : undefined;
    const parsed = format ? strict(slash[1], format) : undefined;
    if (parsed) return parsed;
  }

  const iso = ISO_DATE.exec(s);
  if (iso) {
    return strict(iso[1], 'yyyy-M-d');
  }

  return undefined;
}
