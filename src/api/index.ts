export { default as apiRouter, v1Router } from './routes/index.js';
export { default as healthRoutes } from './routes/health.routes.js';
