/**
 * Twilio webhook helpers
 */

import { validateRequest } from 'twilio';
import { config } from '../config/env';
import logger from '../config/logger';
import { AuthenticationError, ConfigError } from '../utils/errors';

/**
 * Validate Twilio webhook signature
 *
 * @param signature - X-Twilio-Signature header value
 * @param url - Full webhook URL (including protocol and query params)
 * @param params - POST body parameters
 * @throws {AuthenticationError} If signature is invalid
 */
export function validateTwilioSignature(
  signature: string,
  url: string,
  params: Record<string, unknown>
): void {
  if (!config.TWILIO_AUTH_TOKEN) {
    throw new ConfigError('TWILIO_AUTH_TOKEN is required for signature validation');
  }

  const isValid = validateRequest(config.TWILIO_AUTH_TOKEN, signature, url, params);

  if (!isValid) {
    logger.warn({ url }, 'Invalid Twilio webhook signature');
    throw new AuthenticationError('Invalid Twilio webhook signature');
  }

  logger.debug('Twilio webhook signature validated');
}
