/**
 * Extraction service - one entry point per field
 * Chains never throw; callers only ever see an ExtractionResult
 */

import { runChain } from './pipeline';
import { buildNameChain, type NameChainOptions } from './name.extractor';
import { buildPhoneChain, type PhoneChainOptions } from './phone.extractor';
import { buildTimeChain, mentionsDayWithoutHour, type TimeChainOptions } from './time.extractor';
import { prepareTimePhrase } from './relative-dates';
import { zonedReference } from '../../utils/date.utils';
import type {
  ExtractionChain,
  ExtractionContext,
  ExtractionResult,
} from '../../types/extraction.types';

export type ExtractionOptions = NameChainOptions & PhoneChainOptions & TimeChainOptions;

export class ExtractionService {
  private readonly nameChain: ExtractionChain<string>;
  private readonly phoneChain: ExtractionChain<string>;

  constructor(
    private readonly options: ExtractionOptions,
    private readonly clock: () => number = Date.now
  ) {
    this.nameChain = buildNameChain(options);
    this.phoneChain = buildPhoneChain(options);
  }

  extractName(transcript: string, context: ExtractionContext): Promise<ExtractionResult<string>> {
    return runChain(this.nameChain, transcript, context.deadline, this.clock);
  }

  extractPhone(transcript: string, context: ExtractionContext): Promise<ExtractionResult<string>> {
    return runChain(this.phoneChain, transcript, context.deadline, this.clock);
  }

  /**
   * @returns UTC start time; `no_time_of_day` when a day was named without a time
   */
  async extractTime(transcript: string, context: ExtractionContext): Promise<ExtractionResult<Date>> {
    const chain = buildTimeChain(this.options, context.now);
    const result = await runChain(chain, transcript, context.deadline, this.clock);

    if (result.status === 'failed' && transcript.trim()) {
      const prepared = prepareTimePhrase(transcript, zonedReference(context.now, this.options.timezone));
      if (mentionsDayWithoutHour(prepared.text, prepared.reference)) {
        return { status: 'failed', reason: 'no_time_of_day' };
      }
    }

    return result;
  }
}
