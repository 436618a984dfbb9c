import { Router } from 'express';
import healthRoutes from './health.routes';
import sessionsRoutes from './sessions.routes';
import searchesRoutes from './searches.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Operator sessions (targets, scope, CSV, staging, search launch)
router.use('/sessions', sessionsRoutes);

// Search status, cancellation and outcome
router.use('/searches', searchesRoutes);

export default router;
