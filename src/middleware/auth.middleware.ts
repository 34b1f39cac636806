/**
 * Authentication middleware
 * Twilio webhook signature verification and operator API key auth
 */

import { timingSafeEqual } from 'crypto';
import '../types/express.types';
import { Request, Response, NextFunction } from 'express';
import { validateTwilioSignature } from '../services/twilio.service';
import { config } from '../config/env';
import { AuthenticationError } from '../utils/errors';
import logger from '../config/logger';

/**
 * Verify Twilio webhook signature
 * Behind a proxy the public URL is rebuilt from the X-Forwarded headers
 */
export function verifyTwilioWebhook(req: Request, _res: Response, next: NextFunction): void {
  if (!config.TWILIO_WEBHOOK_SIGNATURE_VALIDATION) {
    next();
    return;
  }

  try {
    const signature = req.header('X-Twilio-Signature');
    if (!signature) {
      throw new AuthenticationError('Missing Twilio signature header');
    }

    const forwardedProto = req.header('X-Forwarded-Proto') || req.protocol;
    const forwardedHost = req.header('X-Forwarded-Host') || req.get('host');
    const url = `${forwardedProto}://${forwardedHost}${req.originalUrl}`;

    validateTwilioSignature(signature, url, req.body);
    next();
  } catch (error) {
    logger.warn(
      { err: error, url: req.originalUrl, correlationId: req.correlationId },
      'Twilio webhook signature verification failed'
    );
    next(error);
  }
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Verify operator API key (X-API-Key header)
 */
export function verifyApiKey(req: Request, _res: Response, next: NextFunction): void {
  try {
    if (!config.API_KEY) {
      throw new AuthenticationError('Operator API is not configured');
    }

    const apiKey = req.header('X-API-Key');
    if (!apiKey) {
      throw new AuthenticationError('Missing API key');
    }

    if (!keysMatch(apiKey, config.API_KEY)) {
      throw new AuthenticationError('Invalid API key');
    }

    next();
  } catch (error) {
    logger.warn(
      { err: error, url: req.originalUrl, correlationId: req.correlationId },
      'API key verification failed'
    );
    next(error);
  }
}
