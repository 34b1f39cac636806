/**
 * Admin routes
 * Security: X-API-Key on every route
 */

import { Router } from 'express';
import { verifyApiKey } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';
import type { AdminController } from '../controllers/admin.controller';

export function createAdminRoutes(controller: AdminController): Router {
  const router = Router();

  router.use(verifyApiKey);

  router.get('/sessions/:callId', asyncHandler(controller.getSession));

  /**
   * The only way a session goes back to ask_name
   */
  router.post('/sessions/:callId/reset', asyncHandler(controller.resetSession));

  return router;
}
