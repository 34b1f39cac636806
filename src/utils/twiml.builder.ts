/**
 * TwiML (Twilio Markup Language) response builder
 * Creates XML responses for Twilio voice calls
 */

const VOICE = 'Polly.Joanna';

/**
 * Build TwiML that speaks a prompt and gathers the caller's speech
 * When the caller stays silent Twilio falls through to the redirect,
 * which posts an empty SpeechResult to the same action
 * @param prompt - Prompt to speak inside the gather
 * @param action - Callback URL for the gathered speech
 * @param timeout - Seconds of silence before giving up
 */
export function buildSpeechGatherResponse(prompt: string, action: string, timeout: number = 5): string {
  const url = escapeXml(action);
  return `<?xml version="1.0" encoding="UTF-8"?>
<Response>
  <Gather input="speech" action="${url}" method="POST" timeout="${timeout}" speechTimeout="auto">
    <Say voice="${VOICE}">${escapeXml(prompt)}</Say>
  </Gather>
  <Redirect method="POST">${url}</Redirect>
</Response>`;
}

/**
 * Build TwiML response for playing a message and hanging up
 * @param message - Message to speak
 */
export function buildSayResponse(message: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<Response>
  <Say voice="${VOICE}">${escapeXml(message)}</Say>
  <Hangup/>
</Response>`;
}

/**
 * Build TwiML response for error scenarios
 * @param errorMessage - Caller-facing message
 */
export function buildErrorResponse(errorMessage?: string): string {
  const message =
    errorMessage ||
    "We're sorry, something went wrong on our side. Please call back in a few minutes.";

  return buildSayResponse(message);
}

/**
 * Escape XML special characters to prevent injection
 * @param unsafe - String that may contain XML special chars
 */
export function escapeXml(unsafe: string): string {
  return unsafe
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
