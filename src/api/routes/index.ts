import { Router } from 'express';

import healthRoutes from './health.routes.js';
import conversationRoutes from './conversation.routes.js';
import availabilityRoutes from './availability.routes.js';
import bookingsRoutes from './bookings.routes.js';
import pricingRoutes from './pricing.routes.js';
import adminRoutes from './admin.routes.js';

export const v1Router = Router();
v1Router.use(conversationRoutes);
v1Router.use(availabilityRoutes);
v1Router.use(bookingsRoutes);
v1Router.use(pricingRoutes);
if (process.env.NODE_ENV !== 'production') {
  v1Router.use(adminRoutes);
}

const router = Router();
router.use(healthRoutes);
router.use('/v1', v1Router);

export default router;
