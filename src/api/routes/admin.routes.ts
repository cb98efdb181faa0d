import { Router } from 'express';

import { BookingService } from '@services/booking/booking.service.js';

import { todayISO } from '@utils/time.js';

import { SeedBodySchema, parseWith } from '../validators/request.schemas.js';

const router = Router();
const bookings = new BookingService();

router.post('/admin/bookings/reset', async (_req, res, next) => {
  try {
    await bookings.resetBookings();
    res.status(204).end();
  } catch (e) {
    next(e);
  }
});

router.post('/admin/bookings/seed', async (req, res, next) => {
  try {
    const { today } = parseWith(SeedBodySchema, req.body ?? {});
    const seeded = await bookings.seedDemoBookings(today ?? todayISO());
    res.status(201).json({ bookings: seeded });
  } catch (e) {
    next(e);
  }
});

export default router;
