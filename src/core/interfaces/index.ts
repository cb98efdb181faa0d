export type BookingIntent = 'book' | 'modify' | 'cancel';

export const SLOT_FIELDS = ['service', 'date', 'time', 'location'] as const;

export type SlotField = (typeof SLOT_FIELDS)[number];

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface BookingState {
  service?: string;
  date?: string;
  time?: string;
  location?: string;
  intent: BookingIntent;
  delegated: boolean;
  locationAutoSelected: boolean;
  serviceAutoSelected: boolean;
  confidences: Record<SlotField, number>;
  ambiguities: string[];
  explanation: string;
}

export interface ExplainabilityBreakdown {
  avgConfidence: number;
  ambiguityCount: number;
  ambiguityPenaltyPct: number;
  missingCount: number;
  missingPenaltyPct: number;
  score: number;
}

export interface ExplainabilityScore {
  score: number;
  breakdown: ExplainabilityBreakdown;
}

export function missingFields(state: BookingState): SlotField[] {
  return SLOT_FIELDS.filter((field) => !state[field]);
}

export * from './booking.types.js';
