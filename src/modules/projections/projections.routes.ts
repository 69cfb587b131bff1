import { Router } from 'express';
import { ProjectionController } from './projections.controller';
import { ProjectionService } from './projections.service';
import { validateRequest } from '../../middleware/validation.middleware';
import { projectionLimiter } from '../../middleware/rate-limit.middleware';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import {
  gameProjectionSchema,
  projectionExportQuerySchema,
  teamProjectionSchema,
} from './projections.schemas';

// Resolve dependencies from container
const projectionService = container.resolve<ProjectionService>(KEYS.PROJECTION_SERVICE);
const projectionController = new ProjectionController(projectionService);

const router = Router();

// POST /api/projections/team?format=json|csv&sort=<column>
router.post(
  '/team',
  projectionLimiter,
  validateRequest(projectionExportQuerySchema, 'query'),
  validateRequest(teamProjectionSchema),
  asyncHandler(projectionController.getTeamProjections)
);

// POST /api/projections/game - both teams; one side failing does not fail the other
router.post(
  '/game',
  projectionLimiter,
  validateRequest(projectionExportQuerySchema, 'query'),
  validateRequest(gameProjectionSchema),
  asyncHandler(projectionController.getGameProjections)
);

export default router;
