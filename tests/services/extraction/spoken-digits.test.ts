import { spokenDigitsToNumerals } from '../../../src/services/extraction/spoken-digits';

describe('spokenDigitsToNumerals', () => {
  test('joins spelled digits into one run', () => {
    expect(spokenDigitsToNumerals('eight one five three two double eight nine five seven')).toBe('8153288957');
  });

  test('reads "oh" as zero only after a digit', () => {
    expect(spokenDigitsToNumerals('oh my number is four oh three five five five oh one two three')).toBe(
      '4035550123'
    );
  });

  test('keeps numerals mixed in with words', () => {
    expect(spokenDigitsToNumerals('403 five five five 0123')).toBe('4035550123');
  });

  test('separates runs broken by other words', () => {
    expect(spokenDigitsToNumerals('one two and then three four')).toBe('12 34');
  });

  test('returns null when nothing was spelled out', () => {
    expect(spokenDigitsToNumerals('call me on 555')).toBeNull();
    expect(spokenDigitsToNumerals('no idea')).toBeNull();
  });
});
