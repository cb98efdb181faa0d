import { Router } from 'express';

import { generateClarifyingQuestion } from '@services/ai/clarifier.js';
import { ConversationService } from '@services/conversation/conversation.service.js';

import { ExtractBodySchema, TurnBodySchema, parseWith } from '../validators/request.schemas.js';

const router = Router();
const conversation = new ConversationService();

// POST /v1/conversation/extract { turns, today? }
router.post('/conversation/extract', async (req, res, next) => {
  try {
    const { turns, today } = parseWith(ExtractBodySchema, req.body);
    const evaluated = await conversation.evaluate(turns, today);
    res.json({ ...evaluated, clarifyingQuestion: generateClarifyingQuestion(evaluated.state) ?? null });
  } catch (e) {
    next(e);
  }
});

// POST /v1/conversation/turn { turns, confirm?, acceptSuggestion?, meta?, today? }
router.post('/conversation/turn', async (req, res, next) => {
  try {
    const { turns, ...options } = parseWith(TurnBodySchema, req.body);
    const outcome = await conversation.handleTurn(turns, options);
    res.status(outcome.kind === 'confirmed' ? 201 : 200).json(outcome);
  } catch (e) {
    next(e);
  }
});

export default router;
