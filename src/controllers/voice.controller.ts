/**
 * Voice controller - per-turn webhook
 * {call_id, caller_number, speech_text} -> {next_prompt, terminal}
 */

import { Request, Response } from 'express';
import { turnRequestSchema } from '../schemas/turn.schema';
import type { ConversationService } from '../services/conversation.service';

export function createVoiceController(conversation: ConversationService) {
  /**
   * Handle one caller utterance
   * The body is validated before the session is loaded, so a malformed
   * request never touches stored state
   */
  async function handleTurn(req: Request, res: Response): Promise<void> {
    const body = turnRequestSchema.parse(req.body);

    const reply = await conversation.handleTurn({
      callId: body.call_id,
      callerNumber: body.caller_number,
      speechText: body.speech_text,
    });

    res.status(200).json(reply);
  }

  return { handleTurn };
}

export type VoiceController = ReturnType<typeof createVoiceController>;
