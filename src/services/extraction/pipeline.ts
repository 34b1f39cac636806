/**
 * Ordered extraction chain runner
 * Tries each layer in turn and returns the first value found; layer errors and
 * timeouts fall through to the next layer and never reach the caller
 */

import { createChildLogger } from '../../config/logger';
import { LayerTimeoutError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import type { ExtractionChain, ExtractionResult } from '../../types/extraction.types';

const log = createChildLogger({ service: 'extraction' });

/**
 * Run a chain against one transcript
 * @param chain - Ordered layers for one field
 * @param transcript - Raw speech text for the turn
 * @param deadline - Epoch ms; no layer runs past it
 * @param clock - Time source (tests pin it)
 */
export async function runChain<T>(
  chain: ExtractionChain<T>,
  transcript: string,
  deadline: number,
  clock: () => number = Date.now
): Promise<ExtractionResult<T>> {
  const text = transcript.trim();
  if (!text) {
    return { status: 'failed', reason: 'empty_transcript' };
  }

  for (const layer of chain.layers) {
    const remaining = deadline - clock();
    if (remaining <= 0) {
      log.warn({ field: chain.field, layer: layer.name }, 'Turn budget exhausted before layer ran');
      break;
    }

    const limit = Math.min(layer.timeoutMs ?? remaining, remaining);
    const startedAt = clock();

    try {
      const value = await withTimeout((signal) => layer.extract(text, signal), limit);
      if (value !== null) {
        log.debug(
          { field: chain.field, layer: layer.name, duration: clock() - startedAt },
          'Extraction layer matched'
        );
        return { status: 'success', value, layer: layer.name };
      }
    } catch (error) {
      if (error instanceof LayerTimeoutError) {
        log.warn({ field: chain.field, layer: layer.name, timeoutMs: limit }, 'Extraction layer timed out');
      } else {
        log.warn({ field: chain.field, layer: layer.name, err: error }, 'Extraction layer failed');
      }
    }
  }

  return { status: 'failed', reason: chain.failureReason };
}
