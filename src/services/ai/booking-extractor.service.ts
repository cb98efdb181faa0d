import type { BookingState, ConversationTurn } from '@core/interfaces/index.js';

import { AvailabilityService } from '@services/booking/availability.service.js';

import { logger } from '@utils/logger.js';
import { todayISO } from '@utils/time.js';

import { parseDate } from './date.parser.js';
import {
  APPOINTMENT_REFINEMENTS,
  CANCEL_KEYWORDS,
  CITIES,
  CONFIDENCE,
  DELEGATED_DEFAULT_SERVICE,
  DELEGATED_DEFAULT_TIME,
  DELEGATION_PHRASES,
  FUZZY_TIMES,
  MODIFY_KEYWORDS,
  SERVICES,
  emptyConfidences,
} from './extraction.lexicon.js';
import { containsPhrase, firstPhrase } from './text.match.js';
import { normalizeTime } from './time.parser.js';

const LOCATION_PATTERN = /\bin\s+([a-z ]{3,30})/;

export interface ExtractOptions {
  /** Reference day (yyyy-MM-dd) for relative dates and delegated defaults. */
  today?: string;
}

interface ExtractionDraft {
  state: BookingState;
  explicitLocation?: string;
  clauses: string[];
}

function isKnownCity(value: string): boolean {
  return CITIES.some((city) => city === value);
}

/**
 * Rebuilds a BookingState from the whole conversation. Fields are set once;
 * later turns only fill what earlier turns left empty.
 */
export class BookingStateExtractor {
  constructor(private readonly availabilityService = new AvailabilityService()) {}

  async extract(turns: readonly ConversationTurn[], options: ExtractOptions = {}): Promise<BookingState> {
    const today = options.today ?? todayISO();
    const draft: ExtractionDraft = {
      state: {
        intent: 'book',
        delegated: false,
        locationAutoSelected: false,
        serviceAutoSelected: false,
        confidences: emptyConfidences(),
        ambiguities: [],
        explanation: '',
      },
      clauses: [],
    };

    for (const turn of turns) {
      this.readTurn(draft, turn.content.toLowerCase(), today);
    }

    if (draft.state.delegated) {
      await this.applyDelegatedDefaults(draft, today);
    }

    draft.state.explanation = draft.clauses.join('; ');
    logger.debug('[extract] state built', {
      turns: turns.length,
      service: draft.state.service,
      date: draft.state.date,
      time: draft.state.time,
      location: draft.state.location,
      intent: draft.state.intent,
      delegated: draft.state.delegated,
    });
    return draft.state;
  }

  private readTurn(draft: ExtractionDraft, text: string, today: string): void {
    const { state, clauses } = draft;

    const located = LOCATION_PATTERN.exec(text);
    if (located) {
      const candidate = located[1].trim();
      if (isKnownCity(candidate)) {
        if (!state.location) {
          state.location = candidate;
          state.confidences.location = CONFIDENCE.locationMatch;
          clauses.push(`Location matched via pattern: ${candidate}`);
        }
      } else if (candidate) {
        draft.explicitLocation = candidate;
        clauses.push(`Explicit location mentioned: ${candidate}`);
      }
    }

    if (firstPhrase(text, DELEGATION_PHRASES)) {
      state.delegated = true;
      clauses.push('User delegated decision-making to assistant');
    }

    if (firstPhrase(text, CANCEL_KEYWORDS)) {
      state.intent = 'cancel';
    } else if (firstPhrase(text, MODIFY_KEYWORDS)) {
      state.intent = 'modify';
    }

    if (!state.service) {
      const service = firstPhrase(text, SERVICES);
      if (service) {
        state.service = service;
        state.confidences.service = CONFIDENCE.serviceKeyword;
        clauses.push(`Service matched by keyword '${service}'`);
      }
    }

    if (state.service === 'appointment') {
      const refined = APPOINTMENT_REFINEMENTS.find((r) => r.keywords.some((k) => containsPhrase(text, k)));
      if (refined) {
        state.service = refined.service;
        state.confidences.service = CONFIDENCE.serviceRefined;
        clauses.push(`Mapped generic 'appointment' to specific '${refined.service}'`);
      }
    }

    if (!state.date) {
      const date = parseDate(text, today);
      if (date) {
        state.date = date;
        state.confidences.date = CONFIDENCE.date;
        clauses.push(`Date parsed as ${date}`);
      }
    }

    if (!state.time) {
      const exact = normalizeTime(text);
      if (exact) {
        state.time = exact;
        state.confidences.time = CONFIDENCE.exactTime;
        clauses.push(`Time normalized to ${exact}`);
      } else {
        const fuzzy = FUZZY_TIMES.find(([phrase]) => containsPhrase(text, phrase));
        if (fuzzy) {
          const [phrase, resolved] = fuzzy;
          state.time = resolved;
          state.confidences.time = CONFIDENCE.fuzzyTime;
          state.ambiguities.push(phrase);
          clauses.push(`Fuzzy time '${phrase}' resolved to ${resolved}`);
        }
      }
    }

    if (!state.location) {
      const city = firstPhrase(text, CITIES);
      if (city) {
        state.location = city;
        state.confidences.location = CONFIDENCE.locationMatch;
        clauses.push(`Location matched: ${city}`);
      }
    }
  }

  private async applyDelegatedDefaults(draft: ExtractionDraft, today: string): Promise<void> {
    const { state, clauses } = draft;

    if (!state.service) {
      state.service = DELEGATED_DEFAULT_SERVICE;
      state.serviceAutoSelected = true;
      state.confidences.service = CONFIDENCE.delegatedDefault;
      clauses.push(`Defaulted service to '${DELEGATED_DEFAULT_SERVICE}' due to delegation`);
    }

    if (!state.date) {
      state.date = today;
      state.confidences.date = CONFIDENCE.delegatedDefault;
      clauses.push(`Defaulted date to ${today} due to delegation`);
    }

    if (!state.time) {
      await this.pickDelegatedTime(state, clauses, state.service, state.date);
    }

    if (!state.location) {
      if (draft.explicitLocation) {
        state.location = draft.explicitLocation;
        state.confidences.location = CONFIDENCE.explicitLocation;
        clauses.push(`Used earlier mentioned location '${draft.explicitLocation}' due to delegation`);
      } else {
        const [fallback] = CITIES;
        state.location = fallback;
        state.locationAutoSelected = true;
        state.confidences.location = CONFIDENCE.defaultLocation;
        clauses.push(`Auto-selected location ${fallback} due to delegation`);
      }
    }
  }

  private async pickDelegatedTime(
    state: BookingState,
    clauses: string[],
    service: string,
    date: string,
  ): Promise<void> {
    let reason = 'no available slots found';
    try {
      const next = await this.availabilityService.findNextAvailable(service, date);
      if (next) {
        state.time = next.time;
        state.confidences.time = CONFIDENCE.nextAvailableTime;
        clauses.push(`Auto-selected next available slot ${next.time} for service ${service}`);
        return;
      }
    } catch (err) {
      logger.warn('[extract] slot lookup failed, using static default time', { service, date, err });
      reason = 'slot lookup failed';
    }
    state.time = DELEGATED_DEFAULT_TIME;
    state.confidences.time = CONFIDENCE.delegatedDefault;
    clauses.push(`Defaulted time to ${DELEGATED_DEFAULT_TIME} due to delegation (${reason})`);
  }
}
