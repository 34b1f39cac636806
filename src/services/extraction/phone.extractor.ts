/**
 * Phone number extraction chain
 * digit pattern -> spelled-out digits -> numbering plan -> LLM, every candidate checked against the plan
 */

import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';
import { phoneInstruction } from '../../config/extraction-prompts';
import { toE164 } from '../../utils/phone.utils';
import { spokenDigitsToNumerals } from './spoken-digits';
import type {
  ExtractionChain,
  ExtractionLayer,
  LlmCompletionClient,
} from '../../types/extraction.types';

// A digit, then digits and common separators, ending on a digit; trailing punctuation is left out
const DIGIT_RUN = /\+?\(?\d[\d\s().-]*\d/g;

// A failed run of up to this many digits is retried without its trailing digits
const MAX_RUN_WITH_TRAILING_DIGITS = 12;

/**
 * Leading 11 and 10 digits of a run that also took in a number said after it
 * ("815 328 8957 1 more thing")
 */
function leadingWindows(digits: string): string[] {
  if (digits.length > MAX_RUN_WITH_TRAILING_DIGITS) {
    return [];
  }
  return [11, 10].filter((size) => size < digits.length).map((size) => digits.slice(0, size));
}

/**
 * Find the first 7-11 digit run (up to 15 with a leading +) that the numbering plan accepts.
 * A run without + that fails is retried on its leading 11 and 10 digits.
 * @returns E.164 number or null
 */
export function findPhoneInDigits(text: string, region: CountryCode): string | null {
  for (const match of text.match(DIGIT_RUN) ?? []) {
    const candidate = match.replace(/[^\d+]/g, '');
    const international = candidate.startsWith('+');
    const digits = candidate.replace(/\D/g, '');

    if (digits.length < 7 || digits.length > 15) {
      continue;
    }

    const e164 = digits.length <= (international ? 15 : 11) ? toE164(candidate, region) : null;
    if (e164) {
      return e164;
    }

    if (!international) {
      for (const window of leadingWindows(digits)) {
        const windowed = toE164(window, region);
        if (windowed) {
          return windowed;
        }
      }
    }
  }
  return null;
}

export interface PhoneChainOptions {
  region: CountryCode;
  llm: LlmCompletionClient;
  llmTimeoutMs: number;
}

export function buildPhoneChain(options: PhoneChainOptions): ExtractionChain<string> {
  const { region, llm } = options;

  const digitPattern: ExtractionLayer<string> = {
    name: 'digit_pattern',
    extract: async (transcript) => findPhoneInDigits(transcript, region),
  };

  const spelledDigits: ExtractionLayer<string> = {
    name: 'spelled_digits',
    extract: async (transcript) => {
      const numerals = spokenDigitsToNumerals(transcript);
      return numerals ? findPhoneInDigits(numerals, region) : null;
    },
  };

  const numberingPlan: ExtractionLayer<string> = {
    name: 'numbering_plan',
    extract: async (transcript) => {
      const parsed = parsePhoneNumberFromString(transcript, region);
      return parsed && parsed.isPossible() ? parsed.number : null;
    },
  };

  const llmGuess: ExtractionLayer<string> = {
    name: 'llm',
    timeoutMs: options.llmTimeoutMs,
    extract: async (transcript, signal) => {
      if (!llm.enabled) {
        return null;
      }
      const reply = await llm.complete({ instruction: phoneInstruction(), transcript }, signal);
      return reply ? findPhoneInDigits(reply, region) : null;
    },
  };

  return {
    field: 'phone',
    failureReason: 'no_phone_found',
    layers: [digitPattern, spelledDigits, numberingPlan, llmGuess],
  };
}
