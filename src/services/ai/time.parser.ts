import { DateTime } from 'luxon';

const MERIDIEM_TIME = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/;
const CLOCK_TIME = /\b([01]?\d|2[0-3]):([0-5]\d)\b/;

function toCanonical(hour: number, minute: number): string | undefined {
  const dt = DateTime.fromObject({ hour, minute }, { zone: 'utc', locale: 'en-US' });
  return dt.isValid ? dt.toFormat('h:mm a') : undefined;
}

function fromMeridiem(match: RegExpExecArray): string | undefined {
  let hour = Number(match[1]);
  const minute = Number(match[2] ?? '0');
  if (hour > 12 || minute > 59) return undefined;
  const period = match[3];
  if (period === 'pm' && hour !== 12) hour += 12;
  if (period === 'am' && hour === 12) hour = 0;
  return toCanonical(hour, minute);
}

/**
 * Normalizes "9am", "9:30 AM", "2 pm" or "14:30" into "H:MM AM/PM".
 * Returns undefined when nothing looks like a clock time.
 */
export function normalizeTime(text: string): string | undefined {
  if (!text) return undefined;
  const s = text.toLowerCase();

  const meridiem = MERIDIEM_TIME.exec(s);
  if (meridiem) {
    const resolved = fromMeridiem(meridiem);
    if (resolved) return resolved;
  }

  const clock = CLOCK_TIME.exec(s);
  if (clock) {
    return toCanonical(Number(clock[1]), Number(clock[2]));
  }

  return undefined;
}
