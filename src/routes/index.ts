import { Router } from 'express';
import projectionRoutes from '../modules/projections/projections.routes';
import { container, KEYS } from '../container';
import { ProjectionService } from '../modules/projections/projections.service';

const router = Router();

// Health check
router.get('/health', (req, res) => {
  const projectionService = container.resolve<ProjectionService>(KEYS.PROJECTION_SERVICE);

  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    provider: projectionService.providerId,
    starterPolicy: projectionService.starterPolicy,
  });
});

// Projection routes
router.use('/projections', projectionRoutes);

export default router;
