import { type BookingState, SLOT_FIELDS, type SlotField } from '@core/interfaces/index.js';

export const LOW_CONFIDENCE_THRESHOLD = 0.7;

const FUZZY_RANGES: Record<string, string> = {
  morning: 'between 7 AM and 11 AM',
  afternoon: 'between 12 PM and 4 PM',
  evening: 'between 4 PM and 9 PM',
  tonight: 'after 9 PM',
  night: 'after 9 PM',
  noon: 'around 12 PM',
  'after lunch': 'between 2 PM and 4 PM',
  'before lunch': 'between 11 AM and 12 PM',
};

const LOW_CONFIDENCE_QUESTIONS: Record<SlotField, string> = {
  service: 'Which service would you like (e.g., spa, salon, doctor)?',
  date: 'On which date would you like the booking?',
  time: 'What time of day do you prefer? (e.g., 9 AM, afternoon, evening)',
  location: 'Which city or location do you prefer for this booking?',
};

const MISSING_QUESTIONS: Record<SlotField, string> = {
  service: 'Which service do you want to book? (spa, salon, doctor, etc.)',
  date: 'Which date would you prefer for this booking?',
  time: 'What time would you like?',
  location: 'Which city or location should I use for this booking?',
};

/** Fields that hold a value the extractor was not sure about. */
export function lowConfidenceFields(state: BookingState): SlotField[] {
  return SLOT_FIELDS.filter(
    (field) => Boolean(state[field]) && state.confidences[field] < LOW_CONFIDENCE_THRESHOLD,
  );
}

/**
 * One question, in priority order: the first ambiguity, then the first field
 * under the confidence threshold (unset fields sit at 0), then the first
 * missing field.
 */
export function generateClarifyingQuestion(state: BookingState): string | undefined {
  const [token] = state.ambiguities;
  if (token !== undefined) {
    const range = FUZZY_RANGES[token];
    return range
      ? `When you say '${token}', do you mean ${range}?`
      : `Could you clarify what you mean by '${token}' for the time?`;
  }

  const low = SLOT_FIELDS.find((field) => state.confidences[field] < LOW_CONFIDENCE_THRESHOLD);
  if (low) return LOW_CONFIDENCE_QUESTIONS[low];

  const missing = SLOT_FIELDS.find((field) => !state[field]);
  return missing ? MISSING_QUESTIONS[missing] : undefined;
}
