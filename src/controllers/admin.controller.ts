/**
 * Admin controller - operator inspection and audited resets
 */

import { Request, Response } from 'express';
import { callIdParamsSchema, resetSessionSchema } from '../schemas/turn.schema';
import { NotFoundError } from '../utils/errors';
import type { ConversationService } from '../services/conversation.service';

export function createAdminController(conversation: ConversationService) {
  /**
   * GET /sessions/:callId
   * A call that never saved a turn (or whose session expired) is not found
   */
  async function getSession(req: Request, res: Response): Promise<void> {
    const { callId } = callIdParamsSchema.parse(req.params);
    const session = await conversation.getSession(callId);
    if (session.version === 0) {
      throw new NotFoundError('Session', callId);
    }
    res.status(200).json({ status: 'ok', session });
  }

  /**
   * POST /sessions/:callId/reset
   */
  async function resetSession(req: Request, res: Response): Promise<void> {
    const { callId } = callIdParamsSchema.parse(req.params);
    const { reason } = resetSessionSchema.parse(req.body);

    const session = await conversation.resetSession(callId, reason, req.correlationId ?? 'unknown');
    res.status(200).json({ status: 'ok', session });
  }

  return { getSession, resetSession };
}

export type AdminController = ReturnType<typeof createAdminController>;
