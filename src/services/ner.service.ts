/**
 * Person-name recognition backed by compromise
 */

import nlp from 'compromise';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { NamedEntityRecognizer } from '../types/extraction.types';

export class CompromiseRecognizer implements NamedEntityRecognizer {
  /**
   * compromise parses synchronously, so the layer timer can only fire at the
   * yields around the parse; an answer that arrives after the abort is dropped
   */
  async people(text: string, signal: AbortSignal): Promise<string[]> {
    await yieldToEventLoop();
    if (signal.aborted) {
      return [];
    }

    const found: unknown = nlp(text).people().out('array');

    await yieldToEventLoop();
    if (signal.aborted || !Array.isArray(found)) {
      return [];
    }

    return found.filter((value): value is string => typeof value === 'string');
  }
}
