/**
 * Extraction pipeline types
 */

export type ExtractionResult<T> =
  | { status: 'success'; value: T; layer: string }
  | { status: 'failed'; reason: string };

/**
 * One stage of an extraction chain
 * Returns null when it finds nothing; a throw or timeout is treated the same way
 */
export interface ExtractionLayer<T> {
  name: string;
  /**
   * Per-layer limit; the remaining turn budget applies when omitted
   */
  timeoutMs?: number;
  extract(transcript: string, signal: AbortSignal): Promise<T | null>;
}

export interface ExtractionChain<T> {
  field: 'name' | 'phone' | 'time';
  failureReason: string;
  layers: ReadonlyArray<ExtractionLayer<T>>;
}

/**
 * Per-turn inputs shared by every chain
 */
export interface ExtractionContext {
  /**
   * Instant the turn started; relative phrases resolve against it
   */
  now: Date;
  /**
   * Epoch milliseconds by which the turn's extraction must finish
   */
  deadline: number;
}

/**
 * Collaborator for the last-resort layers
 */
export interface LlmCompletionClient {
  readonly enabled: boolean;
  complete(request: { instruction: string; transcript: string }, signal: AbortSignal): Promise<string | null>;
}

/**
 * Collaborator for person-name recognition
 */
export interface NamedEntityRecognizer {
  people(text: string, signal: AbortSignal): Promise<string[]>;
}
