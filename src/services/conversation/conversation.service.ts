import { SlotConflictError } from '@core/errors/slot-conflict.error.js';
import {
  type Booking,
  type BookingMeta,
  type BookingState,
  type ConfirmedBooking,
  type ConversationTurn,
  type ExplainabilityScore,
  type ResolutionResult,
  type SlotField,
  missingFields,
} from '@core/interfaces/index.js';

import { AssistantReplyService } from '@services/ai/assistant-reply.service.js';
import { BookingStateExtractor } from '@services/ai/booking-extractor.service.js';
import { generateClarifyingQuestion, lowConfidenceFields } from '@services/ai/clarifier.js';
import { computeExplainabilityScore } from '@services/ai/explainability.js';
import { type MessageSignals, detectUrgencyAndStyle } from '@services/ai/signals.js';
import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingService } from '@services/booking/booking.service.js';
import { PricingService } from '@services/pricing/pricing.service.js';
import { buildTextReceipt, summarizeBooking } from '@services/receipts/receipt.builder.js';

import { logger } from '@utils/logger.js';
import { formatDisplayDate } from '@utils/time.js';

const MAX_EXPLANATION_LENGTH = 1000;

export interface TurnOptions {
  /** The user accepted a delegated proposal. */
  confirm?: boolean;
  /** Book the suggested alternative when the requested slot is taken. */
  acceptSuggestion?: boolean;
  meta?: BookingMeta;
  today?: string;
}

export interface SlotProposal {
  service: string;
  date: string;
  time: string;
  location: string;
}

interface TurnContext {
  state: BookingState;
  explainability: ExplainabilityScore;
  signals: MessageSignals;
  reply: string;
}

export type TurnOutcome = TurnContext &
  (
    | { kind: 'clarify'; fields: SlotField[] }
    | { kind: 'ask'; missing: SlotField[]; source: 'llm' | 'fallback' }
    | { kind: 'modify' }
    | { kind: 'cancel' }
    | { kind: 'proposal'; proposal: SlotProposal }
    | { kind: 'conflict'; resolution: ResolutionResult }
    | { kind: 'confirmed'; booking: ConfirmedBooking; receipt: string }
  );

type Evaluated = Omit<TurnContext, 'reply'>;

function lastUserMessage(turns: readonly ConversationTurn[]): string {
  for (let i = turns.length - 1; i >= 0; i -= 1) {
    if (turns[i].role === 'user') return turns[i].content;
  }
  return '';
}

function toProposal(state: BookingState): SlotProposal | null {
  const { service, date, time, location } = state;
  if (!service || !date || !time || !location) return null;
  return { service, date, time, location };
}

export class ConversationService {
  constructor(
    private readonly extractor = new BookingStateExtractor(),
    private readonly bookings = new BookingService(),
    private readonly availability = new AvailabilityService(),
    private readonly pricing = new PricingService(),
    private readonly replies = new AssistantReplyService(),
  ) {}

  async evaluate(turns: readonly ConversationTurn[], today?: string): Promise<Evaluated> {
    const state = await this.extractor.extract(turns, { today });
    return {
      state,
      explainability: computeExplainabilityScore(state),
      signals: detectUrgencyAndStyle(lastUserMessage(turns)),
    };
  }

  async handleTurn(turns: readonly ConversationTurn[], options: TurnOptions = {}): Promise<TurnOutcome> {
    const ctx = await this.evaluate(turns, options.today);
    const outcome = await this.route(turns, ctx, options);
    logger.info('[conversation] turn handled', {
      kind: outcome.kind,
      score: ctx.explainability.score,
      urgent: ctx.signals.urgent,
    });
    return outcome;
  }

  private async route(
    turns: readonly ConversationTurn[],
    ctx: Evaluated,
    options: TurnOptions,
  ): Promise<TurnOutcome> {
    const { state } = ctx;

    const low = lowConfidenceFields(state);
    if (low.length && !state.delegated) {
      const reply = generateClarifyingQuestion(state) ?? `Could you confirm the ${low.join(', ')}?`;
      return { ...ctx, kind: 'clarify', fields: low, reply };
    }

    if (state.intent === 'modify') {
      return {
        ...ctx,
        kind: 'modify',
        reply: 'You want to modify an existing booking. Which booking should I change, and what is the new date or time?',
      };
    }
    if (state.intent === 'cancel') {
      return { ...ctx, kind: 'cancel', reply: 'You want to cancel a booking. Which booking should I cancel?' };
    }

    const missing = missingFields(state);
    const proposal = toProposal(state);
    if (missing.length || !proposal) {
      const drafted = await this.replies.draftQuestion({ state, missing, turns, signals: ctx.signals });
      return { ...ctx, kind: 'ask', missing, source: drafted.source, reply: drafted.text };
    }

    if (state.delegated) {
      if (!options.confirm) {
        return {
          ...ctx,
          kind: 'proposal',
          proposal,
          reply: `I can book ${proposal.service} on ${formatDisplayDate(proposal.date)} at ${proposal.time} in ${proposal.location}. Reply "yes" to confirm or tell me what to change.`,
        };
      }
      return this.reserve(ctx, proposal, options);
    }

    const { available } = await this.availability.checkAvailability(proposal.service, proposal.date, proposal.time);
    if (!available) {
      const resolution = await this.availability.attemptResolve(proposal.service, proposal.date, proposal.time);
      if (options.acceptSuggestion && resolution.suggestion) {
        const booked = await this.bookings.autoBookAlternative(
          proposal.service,
          proposal.date,
          proposal.time,
          proposal.location,
          options.meta,
        );
        return this.confirm(ctx, booked, options.meta);
      }
      return this.conflict(ctx, proposal, resolution);
    }

    return this.reserve(ctx, proposal, options);
  }

  private async reserve(ctx: Evaluated, proposal: SlotProposal, options: TurnOptions): Promise<TurnOutcome> {
    try {
      const booked = await this.bookings.bookSlot(
        proposal.service,
        proposal.date,
        proposal.time,
        proposal.location,
        options.meta,
      );
      return await this.confirm(ctx, booked, options.meta);
    } catch (err) {
      if (!(err instanceof SlotConflictError)) throw err;
      const resolution = await this.availability.attemptResolve(proposal.service, proposal.date, proposal.time);
      return this.conflict(ctx, proposal, resolution);
    }
  }

  private conflict(ctx: Evaluated, proposal: SlotProposal, resolution: ResolutionResult): TurnOutcome {
    const when = `${proposal.time} on ${formatDisplayDate(proposal.date)}`;
    const reply = resolution.suggestion
      ? `${proposal.service} at ${when} is already booked. The next free slot is ${resolution.suggestion}. Shall I book it?`
      : `${proposal.service} at ${when} is already booked and no other slot is free that day.`;
    return { ...ctx, kind: 'conflict', resolution, reply };
  }

  private async confirm(ctx: Evaluated, booked: Booking, meta: BookingMeta = {}): Promise<TurnOutcome> {
    const { state, explainability } = ctx;
    const quote = await this.pricing.calculatePrice(booked.service, explainability.score, meta, booked.location);

    const details = {
      price: quote.amount,
      currency: quote.currency,
      discountPercent: quote.discountPercent,
      delegated: state.delegated,
      explanation: state.explanation.slice(0, MAX_EXPLANATION_LENGTH),
      locationAutoSelected: state.locationAutoSelected,
      serviceAutoSelected: state.serviceAutoSelected,
    };
    const persisted = await this.bookings.attachMeta(booked.id, {
      ...details,
      confidenceScore: explainability.score,
      status: 'confirmed',
    });

    const booking: ConfirmedBooking = { ...persisted, ...details };
    return {
      ...ctx,
      kind: 'confirmed',
      booking,
      receipt: buildTextReceipt(booking),
      reply: `Booking confirmed: ${summarizeBooking(booking)}.`,
    };
  }
}
