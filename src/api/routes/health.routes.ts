import { Router } from 'express';

import { config } from '@config/env.config';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({ status: 'ok', store: config.BOOKING_STORE });
});

export default router;
