import { Router } from 'express';

import { AvailabilityService } from '@services/booking/availability.service.js';

import {
  AvailabilityQuerySchema,
  NextAvailableQuerySchema,
  ResolveQuerySchema,
  parseWith,
} from '../validators/request.schemas.js';

const router = Router();
const availability = new AvailabilityService();

// GET /v1/availability/check?service=spa&date=2099-01-01&time=9:00 AM
router.get('/availability/check', async (req, res, next) => {
  try {
    const { service, date, time } = parseWith(AvailabilityQuerySchema, req.query);
    res.json(await availability.checkAvailability(service, date, time));
  } catch (e) {
    next(e);
  }
});

router.get('/availability/next', async (req, res, next) => {
  try {
    const { service, date, after } = parseWith(NextAvailableQuerySchema, req.query);
    res.json({ next: await availability.findNextAvailable(service, date, after) });
  } catch (e) {
    next(e);
  }
});

router.get('/availability/resolve', async (req, res, next) => {
  try {
    const { service, date, time, allowNearby } = parseWith(ResolveQuerySchema, req.query);
    res.json(await availability.attemptResolve(service, date, time, allowNearby));
  } catch (e) {
    next(e);
  }
});

export default router;
