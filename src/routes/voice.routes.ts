/**
 * Voice routes
 * Per-turn webhook used by the telephony front end
 */

import { Router } from 'express';
import { asyncHandler } from '../middleware/error.middleware';
import type { VoiceController } from '../controllers/voice.controller';

export function createVoiceRoutes(controller: VoiceController): Router {
  const router = Router();

  /**
   * POST /api/v1/voice/turn
   * Body: {call_id, caller_number, speech_text}
   */
  router.post('/turn', asyncHandler(controller.handleTurn));

  return router;
}
