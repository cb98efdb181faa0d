import { Router } from 'express';

import { PricingService } from '@services/pricing/pricing.service.js';

import { QuoteBodySchema, parseWith } from '../validators/request.schemas.js';

const router = Router();
const pricing = new PricingService();

router.post('/pricing/quote', async (req, res, next) => {
  try {
    const body = parseWith(QuoteBodySchema, req.body);
    res.json(await pricing.calculatePrice(body.service, body.confidencePct, body.meta, body.location));
  } catch (e) {
    next(e);
  }
});

export default router;
