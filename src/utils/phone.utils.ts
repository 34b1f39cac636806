/**
 * Phone number utility functions
 * Numbering-plan checks go through libphonenumber-js
 */

import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

/**
 * Check if a caller id is anonymous/blocked/restricted
 * @param phone - Caller id from the telephony provider
 */
export function isAnonymousCaller(phone: string | undefined | null): boolean {
  if (!phone) return true;
  const lowerPhone = phone.trim().toLowerCase();
  return ['anonymous', 'restricted', 'blocked', 'unknown', '', '+'].includes(lowerPhone);
}

/**
 * Validate a candidate against the region's numbering plan and return it as E.164
 * Accepts numbers that are possible for the plan even when the area code is unassigned
 * @param candidate - Digits, optionally with a leading + and country code
 * @param region - Region used when the candidate has no country code
 * @returns E.164 string, or null when the plan rejects it
 */
export function toE164(candidate: string, region: CountryCode): string | null {
  const parsed = parsePhoneNumberFromString(candidate, region);
  if (!parsed || !parsed.isPossible()) {
    return null;
  }
  return parsed.number;
}

/**
 * National format for reading back to a caller, e.g. "(815) 328-8957"
 * @param phone - E.164 number
 */
export function formatPhoneForSpeech(phone: string): string {
  const parsed = parsePhoneNumberFromString(phone);
  return parsed ? parsed.formatNational() : phone;
}

/**
 * Mask phone number for logs (last 4 digits kept)
 * @param phone - Phone number to mask
 */
export function maskPhoneNumber(phone: string | undefined | null): string {
  const cleaned = (phone ?? '').replace(/\D/g, '');
  if (cleaned.length >= 4) {
    return `***-***-${cleaned.slice(-4)}`;
  }
  return '***-***-****';
}
