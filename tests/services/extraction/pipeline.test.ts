import { runChain } from '../../../src/services/extraction/pipeline';
import { sleep } from '../../../src/utils/timeout';
import type { ExtractionChain, ExtractionLayer } from '../../../src/types/extraction.types';

function layer(name: string, extract: ExtractionLayer<string>['extract'], timeoutMs?: number): ExtractionLayer<string> {
  return { name, extract, timeoutMs };
}

function chain(layers: Array<ExtractionLayer<string>>): ExtractionChain<string> {
  return { field: 'name', failureReason: 'no_name_found', layers };
}

describe('runChain', () => {
  const deadline = () => Date.now() + 5_000;

  test('returns the first layer that finds a value', async () => {
    const calls: string[] = [];
    const result = await runChain(
      chain([
        layer('first', async () => {
          calls.push('first');
          return null;
        }),
        layer('second', async () => {
          calls.push('second');
          return 'found';
        }),
        layer('third', async () => {
          calls.push('third');
          return 'too late';
        }),
      ]),
      'some speech',
      deadline()
    );

    expect(result).toEqual({ status: 'success', value: 'found', layer: 'second' });
    expect(calls).toEqual(['first', 'second']);
  });

  test('a throwing layer falls through', async () => {
    const result = await runChain(
      chain([
        layer('broken', async () => {
          throw new Error('recognizer crashed');
        }),
        layer('backup', async () => 'found'),
      ]),
      'some speech',
      deadline()
    );

    expect(result).toEqual({ status: 'success', value: 'found', layer: 'backup' });
  });

  test('a slow layer is cut off at its own timeout', async () => {
    const result = await runChain(
      chain([
        layer(
          'slow',
          async (_text, signal) => {
            await sleep(5_000, signal);
            return 'never';
          },
          30
        ),
        layer('fast', async () => 'found'),
      ]),
      'some speech',
      deadline()
    );

    expect(result).toEqual({ status: 'success', value: 'found', layer: 'fast' });
  });

  test('layers receive trimmed text', async () => {
    const seen: string[] = [];
    await runChain(
      chain([
        layer('echo', async (text) => {
          seen.push(text);
          return null;
        }),
      ]),
      '  padded  ',
      deadline()
    );
    expect(seen).toEqual(['padded']);
  });

  test('no layer runs once the turn budget is spent', async () => {
    let called = false;
    const result = await runChain(
      chain([
        layer('never', async () => {
          called = true;
          return 'value';
        }),
      ]),
      'some speech',
      1_000,
      () => 2_000
    );

    expect(result).toEqual({ status: 'failed', reason: 'no_name_found' });
    expect(called).toBe(false);
  });

  test('empty transcripts fail without running layers', async () => {
    await expect(runChain(chain([]), '  ', deadline())).resolves.toEqual({
      status: 'failed',
      reason: 'empty_transcript',
    });
  });
});
