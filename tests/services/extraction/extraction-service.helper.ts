import { ExtractionService } from '../../../src/services/extraction/extraction.service';
import { DisabledCompletionClient } from '../../../src/services/llm.service';
import { StaticRecognizer } from '../../fakes/ner.fake';
import { NOW, TIMEZONE } from '../../fakes/fixtures';
import type {
  ExtractionContext,
  LlmCompletionClient,
  NamedEntityRecognizer,
} from '../../../src/types/extraction.types';

export function buildExtraction(
  overrides: { llm?: LlmCompletionClient; ner?: NamedEntityRecognizer; nerTimeoutMs?: number } = {}
): ExtractionService {
  return new ExtractionService({
    region: 'CA',
    timezone: TIMEZONE,
    ner: overrides.ner ?? new StaticRecognizer([]),
    nerTimeoutMs: overrides.nerTimeoutMs ?? 1_500,
    llm: overrides.llm ?? new DisabledCompletionClient(),
    llmTimeoutMs: 3_000,
  });
}

export function turnContext(now: Date = NOW): ExtractionContext {
  return { now, deadline: Date.now() + 8_000 };
}
