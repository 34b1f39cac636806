/**
 * Spoken-number normalization for phone transcripts
 */

const DIGIT_WORDS = new Map<string, string>([
  ['zero', '0'],
  ['one', '1'],
  ['two', '2'],
  ['three', '3'],
  ['four', '4'],
  ['five', '5'],
  ['six', '6'],
  ['seven', '7'],
  ['eight', '8'],
  ['nine', '9'],
]);

// Only read as zero right after another digit ("eight oh five")
const ZERO_LETTERS = new Set(['oh', 'o']);

const REPEATERS = new Map<string, number>([
  ['double', 2],
  ['triple', 3],
]);

/**
 * Replace digit words with numerals, joining neighbouring digits into one run
 * e.g. "eight one five double two" -> "81522"
 * @returns Digit runs separated by spaces, or null when no digit word was found
 */
export function spokenDigitsToNumerals(text: string): string | null {
  const tokens = text.toLowerCase().match(/[a-z]+|\d+|\+/g);
  if (!tokens) {
    return null;
  }

  const runs: string[] = [];
  let run = '';
  let repeat = 1;
  let converted = false;

  const flush = () => {
    if (run && run !== '+') {
      runs.push(run);
    }
    run = '';
  };

  for (const token of tokens) {
    const repeater = REPEATERS.get(token);
    if (repeater !== undefined) {
      repeat = repeater;
      continue;
    }

    let digits: string | undefined;
    if (/^\d+$/.test(token)) {
      digits = token;
    } else if (DIGIT_WORDS.has(token)) {
      digits = DIGIT_WORDS.get(token);
      converted = true;
    } else if (ZERO_LETTERS.has(token) && /\d$/.test(run)) {
      digits = '0';
      converted = true;
    } else if (token === '+') {
      flush();
      run = '+';
      continue;
    }

    if (digits === undefined) {
      repeat = 1;
      flush();
      continue;
    }

    run += digits.length === 1 ? digits.repeat(repeat) : digits;
    repeat = 1;
  }
  flush();

  return converted && runs.length > 0 ? runs.join(' ') : null;
}
