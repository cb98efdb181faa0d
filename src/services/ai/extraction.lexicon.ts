import type { SlotField } from '@core/interfaces/index.js';

// "head spa" sits before "spa" so the longer name wins.
export const SERVICES = [
  'hotel',
  'flight',
  'appointment',
  'head spa',
  'spa',
  'salon',
  'hospital',
  'doctor',
  'travel',
] as const;

export const CITIES = [
  'bangalore',
  'delhi',
  'mumbai',
  'chennai',
  'hyderabad',
  'mangalagiri',
  'vijayawada',
] as const;

export const DELEGATION_PHRASES = [
  'you decide',
  'you pick',
  'you choose',
  'book it',
  'do it',
  'go ahead',
  'surprise me',
  'anything works',
  "i don't care",
  'i dont care',
  'up to you',
  'whatever you think',
] as const;

export const CANCEL_KEYWORDS = ['cancel', 'cancelled', 'delete'] as const;
export const MODIFY_KEYWORDS = ['change', 'modify', 'modifying', 'reschedule'] as const;

/** Sub-type refinements applied to the generic "appointment" service. */
export const APPOINTMENT_REFINEMENTS: ReadonlyArray<{ service: string; keywords: readonly string[] }> = [
  { service: 'facial', keywords: ['facial', 'face', 'skincare', 'cleaning', 'derma'] },
  { service: 'dental', keywords: ['dental', 'dentist'] },
];

/** Fuzzy time expressions and the concrete time each one commits to. Order matters. */
export const FUZZY_TIMES: ReadonlyArray<readonly [phrase: string, time: string]> = [
  ['morning', '10:00 AM'],
  ['afternoon', '2:00 PM'],
  ['evening', '6:00 PM'],
  ['tonight', '8:00 PM'],
  ['night', '8:00 PM'],
  ['noon', '12:00 PM'],
  ['after lunch', '2:00 PM'],
  ['before lunch', '11:30 AM'],
];

export const CONFIDENCE = {
  locationMatch: 0.9,
  serviceKeyword: 0.95,
  serviceRefined: 0.9,
  date: 0.9,
  exactTime: 0.95,
  fuzzyTime: 0.7,
  delegatedDefault: 0.6,
  nextAvailableTime: 0.75,
  explicitLocation: 0.8,
  defaultLocation: 0.5,
} as const;

export const DELEGATED_DEFAULT_SERVICE = 'facial';
export const DELEGATED_DEFAULT_TIME = '10:00 AM';

export function emptyConfidences(): Record<SlotField, number> {
  return { service: 0, date: 0, time: 0, location: 0 };
}
