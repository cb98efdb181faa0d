import { normalizeTime } from '@services/ai/time.parser.js';

export const ANYTIME = 'Anytime';

export type SlotCatalog = Readonly<Record<string, readonly string[]>>;

/** Offered times per service, in the order they are proposed. */
export const DEFAULT_SLOT_CATALOG: SlotCatalog = {
  spa: ['9:00 AM', '10:00 AM', '11:00 AM', '4:00 PM'],
  salon: ['10:00 AM', '12:00 PM', '3:00 PM'],
  facial: ['10:00 AM', '11:00 AM', '3:00 PM'],
  dental: ['9:00 AM', '11:00 AM', '2:00 PM'],
  doctor: ['9:00 AM', '1:00 PM', '6:00 PM'],
  'head spa': ['10:00 AM', '2:00 PM'],
  hotel: [ANYTIME],
  travel: ['Morning', 'Evening'],
};

export function slotsFor(catalog: SlotCatalog, service: string): string[] | undefined {
  const slots = Object.prototype.hasOwnProperty.call(catalog, service) ? catalog[service] : undefined;
  return slots ? [...slots] : undefined;
}

const CANONICAL_TIME = /^(?:[1-9]|1[0-2]):[0-5]\d (?:AM|PM)$/;
const CLOCK_INPUT = /^\d{1,2}(?::\d{2})?\s*(?:am|pm)$|^\d{1,2}:\d{2}$/i;

/** Catalog entries that are not clock times, such as "Anytime" or "Morning". */
export const CATALOG_LABELS: readonly string[] = [...new Set(Object.values(DEFAULT_SLOT_CATALOG).flat())].filter(
  (slot) => !CANONICAL_TIME.test(slot),
);

/** True for "H:MM AM/PM" or a catalog label, the only forms a booking may store. */
export function isSlotTime(value: string): boolean {
  return CANONICAL_TIME.test(value) || CATALOG_LABELS.includes(value);
}

/** "9am" -> "9:00 AM", "14:30" -> "2:30 PM", "morning" -> "Morning"; anything else is undefined. */
export function toSlotTime(value: string): string | undefined {
  const trimmed = value.trim();
  const label = CATALOG_LABELS.find((l) => l.toLowerCase() === trimmed.toLowerCase());
  if (label) return label;
  return CLOCK_INPUT.test(trimmed) ? normalizeTime(trimmed) : undefined;
}
