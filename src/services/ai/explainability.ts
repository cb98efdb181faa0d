import {
  type BookingState,
  type ExplainabilityScore,
  SLOT_FIELDS,
  missingFields,
} from '@core/interfaces/index.js';

const AMBIGUITY_PENALTY = 0.15;
const MAX_AMBIGUITY_PENALTY = 0.45;
const MISSING_PENALTY = 0.1;
const MAX_MISSING_PENALTY = 0.3;

const round2 = (value: number): number => Math.round(value * 100) / 100;

/** 0–100; higher means the state rests on stated rather than inferred values. */
export function computeExplainabilityScore(state: BookingState): ExplainabilityScore {
  const avgConfidence =
    SLOT_FIELDS.reduce((sum, field) => sum + state.confidences[field], 0) / SLOT_FIELDS.length;
  const ambiguityPenalty = Math.min(state.ambiguities.length * AMBIGUITY_PENALTY, MAX_AMBIGUITY_PENALTY);
  const missing = missingFields(state);
  const missingPenalty = Math.min(missing.length * MISSING_PENALTY, MAX_MISSING_PENALTY);

  const raw = avgConfidence * (1 - ambiguityPenalty - missingPenalty);
  const score = round2(Math.max(0, Math.min(1, raw)) * 100);

  return {
    score,
    breakdown: {
      avgConfidence: round2(avgConfidence * 100),
      ambiguityCount: state.ambiguities.length,
      ambiguityPenaltyPct: round2(ambiguityPenalty * 100),
      missingCount: missing.length,
      missingPenaltyPct: round2(missingPenalty * 100),
      score,
    },
  };
}
