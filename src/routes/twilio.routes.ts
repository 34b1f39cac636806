/**
 * Twilio routes
 * Defines routes for Twilio webhook endpoints
 */

import { Router } from 'express';
import { verifyTwilioWebhook } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';
import type { TwilioController } from '../controllers/twilio.controller';

export function createTwilioRoutes(controller: TwilioController): Router {
  const router = Router();

  /**
   * POST /api/v1/twilio/voice
   * Inbound call webhook
   * Security: Twilio signature verification
   */
  router.post('/voice', verifyTwilioWebhook, asyncHandler(controller.handleVoice));

  /**
   * POST /api/v1/twilio/voice/collect
   * <Gather> action callback
   * Security: Twilio signature verification
   */
  router.post('/voice/collect', verifyTwilioWebhook, asyncHandler(controller.handleCollect));

  return router;
}
