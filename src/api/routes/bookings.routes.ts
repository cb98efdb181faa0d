import { Router } from 'express';

import { NotFoundError } from '@core/errors/not-found.error.js';

import { BookingService } from '@services/booking/booking.service.js';

import {
  AutoBookingBodySchema,
  CreateBookingBodySchema,
  ModifyBookingBodySchema,
  parseWith,
} from '../validators/request.schemas.js';

const router = Router();
const bookings = new BookingService();

router.get('/bookings', async (_req, res, next) => {
  try {
    res.json({ bookings: await bookings.listBookings() });
  } catch (e) {
    next(e);
  }
});

router.get('/bookings/:id', async (req, res, next) => {
  try {
    res.json(await bookings.getBooking(req.params.id));
  } catch (e) {
    next(e);
  }
});

router.post('/bookings', async (req, res, next) => {
  try {
    const body = parseWith(CreateBookingBodySchema, req.body);
    const created = await bookings.bookSlot(body.service, body.date, body.time, body.location, body.meta);
    res.status(201).json(created);
  } catch (e) {
    next(e);
  }
});

// Books the first free slot after `time` (or the first free slot of the day).
router.post('/bookings/auto', async (req, res, next) => {
  try {
    const body = parseWith(AutoBookingBodySchema, req.body);
    const created = await bookings.autoBookAlternative(body.service, body.date, body.time, body.location, body.meta);
    res.status(201).json(created);
  } catch (e) {
    next(e);
  }
});

router.patch('/bookings/:id', async (req, res, next) => {
  try {
    const patch = parseWith(ModifyBookingBodySchema, req.body);
    res.json(await bookings.modifyBooking({ id: req.params.id, patch }));
  } catch (e) {
    next(e);
  }
});

router.delete('/bookings/:id', async (req, res, next) => {
  try {
    const removed = await bookings.cancelBooking(req.params.id);
    if (!removed) throw new NotFoundError('Booking', req.params.id);
    res.status(204).end();
  } catch (e) {
    next(e);
  }
});

export default router;
