/**
 * Twilio controller - carries the turn contract over TwiML <Gather>
 */

import { Request, Response } from 'express';
import { createChildLogger } from '../config/logger';
import { twilioGatherSchema } from '../schemas/turn.schema';
import { prompts } from '../services/conversation.prompts';
import { buildErrorResponse, buildSayResponse, buildSpeechGatherResponse } from '../utils/twiml.builder';
import { isAnonymousCaller, maskPhoneNumber } from '../utils/phone.utils';
import type { ConversationService } from '../services/conversation.service';

const log = createChildLogger({ controller: 'twilio' });

/**
 * Collect URL relative to where the router is mounted
 */
function collectUrl(req: Request): string {
  return `${req.baseUrl}/voice/collect`;
}

function sendTwiml(res: Response, twiml: string): void {
  res.type('text/xml').status(200).send(twiml);
}

export function createTwilioController(conversation: ConversationService) {
  /**
   * Inbound call: greet and gather the caller's name
   */
  async function handleVoice(req: Request, res: Response): Promise<void> {
    const call = twilioGatherSchema.parse(req.body);

    log.info(
      {
        callSid: call.CallSid,
        from: isAnonymousCaller(call.From) ? 'Anonymous' : maskPhoneNumber(call.From),
        correlationId: req.correlationId,
      },
      'Inbound call received'
    );

    sendTwiml(res, buildSpeechGatherResponse(prompts.greeting(), collectUrl(req)));
  }

  /**
   * Gathered speech: run one turn and answer with the next prompt
   * A failed turn ends the call with a spoken apology, not an HTTP error
   */
  async function handleCollect(req: Request, res: Response): Promise<void> {
    const call = twilioGatherSchema.parse(req.body);

    try {
      const reply = await conversation.handleTurn({
        callId: call.CallSid,
        callerNumber: call.From,
        speechText: call.SpeechResult,
      });

      sendTwiml(
        res,
        reply.terminal
          ? buildSayResponse(reply.next_prompt)
          : buildSpeechGatherResponse(reply.next_prompt, collectUrl(req))
      );
    } catch (error) {
      log.error({ err: error, callSid: call.CallSid, correlationId: req.correlationId }, 'Turn failed during call');
      sendTwiml(res, buildErrorResponse());
    }
  }

  return { handleVoice, handleCollect };
}

export type TwilioController = ReturnType<typeof createTwilioController>;
