/**
 * Caller name extraction chain
 * introduction pattern -> named-entity recognition -> LLM, all filtered through the artifact denylist
 */

import { nameInstruction } from '../../config/extraction-prompts';
import denylist from './name-denylist.json';
import type {
  ExtractionChain,
  ExtractionLayer,
  LlmCompletionClient,
  NamedEntityRecognizer,
} from '../../types/extraction.types';

const DENYLIST = new Set<string>([...denylist.fillers, ...denylist.phrases, ...denylist.booking]);

const INTRODUCTION =
  /\b(?:my name is|my name's|name is|this is|call me|i am|i'm|it's|it is)\s+(.+)$/i;

// Any script's letters: "José", "Côté", "O'Brien"
const NAME_TOKEN = /^\p{L}[\p{L}'-]*\p{L}$/u;

// Longest run of name tokens accepted as one name ("Mary Ann Smith")
const MAX_NAME_TOKENS = 3;

function tokenize(text: string): string[] {
  return text.normalize('NFC').toLocaleLowerCase().match(/\p{L}[\p{L}'-]*/gu) ?? [];
}

function isDenied(token: string): boolean {
  return DENYLIST.has(token.replace(/'/g, '')) || !NAME_TOKEN.test(token);
}

function titleCase(token: string): string {
  return token
    .split(/([-'])/)
    .map((part) => (part.length > 0 ? part[0].toLocaleUpperCase() + part.slice(1) : part))
    .join('');
}

/**
 * First and last token of a name run as "First Last"
 */
function formatName(run: string[]): string | null {
  if (run.length < 2 || run.length > MAX_NAME_TOKENS) {
    return null;
  }
  return `${titleCase(run[0])} ${titleCase(run[run.length - 1])}`;
}

/**
 * True when any token of `name` is a filler, fragment or other transcript artifact
 */
export function isDenylistedName(name: string): boolean {
  const tokens = tokenize(name);
  return tokens.length === 0 || tokens.some(isDenied);
}

/**
 * Clean a whole candidate (from NER or the LLM): every token must pass the denylist
 * @returns "First Last" or null
 */
export function normalizePersonName(raw: string): string | null {
  if (isDenylistedName(raw)) {
    return null;
  }
  return formatName(tokenize(raw));
}

/**
 * Skip leading artifacts, then take the run of name tokens that follows
 */
function nameFromTokens(tokens: string[]): string | null {
  let index = 0;
  while (index < tokens.length && isDenied(tokens[index])) {
    index += 1;
  }

  const run: string[] = [];
  while (index < tokens.length && !isDenied(tokens[index])) {
    run.push(tokens[index]);
    index += 1;
  }

  return formatName(run);
}

/**
 * Pattern layer: "my name is X", "this is X", "I'm X", ... or a bare two-word reply
 */
export function matchIntroducedName(transcript: string): string | null {
  const introduced = INTRODUCTION.exec(transcript);
  if (introduced) {
    return nameFromTokens(tokenize(introduced[1]));
  }

  const tokens = tokenize(transcript).filter((token) => !isDenied(token));
  return tokens.length === 2 ? formatName(tokens) : null;
}

export interface NameChainOptions {
  ner: NamedEntityRecognizer;
  nerTimeoutMs: number;
  llm: LlmCompletionClient;
  llmTimeoutMs: number;
}

export function buildNameChain(options: NameChainOptions): ExtractionChain<string> {
  const { ner, llm } = options;

  const pattern: ExtractionLayer<string> = {
    name: 'pattern',
    extract: async (transcript) => matchIntroducedName(transcript),
  };

  const entities: ExtractionLayer<string> = {
    name: 'ner',
    timeoutMs: options.nerTimeoutMs,
    extract: async (transcript, signal) => {
      const people = await ner.people(transcript, signal);
      for (const person of people) {
        const name = normalizePersonName(person);
        if (name) {
          return name;
        }
      }
      return null;
    },
  };

  const llmGuess: ExtractionLayer<string> = {
    name: 'llm',
    timeoutMs: options.llmTimeoutMs,
    extract: async (transcript, signal) => {
      if (!llm.enabled) {
        return null;
      }
      const reply = await llm.complete({ instruction: nameInstruction(), transcript }, signal);
      return reply ? normalizePersonName(reply) : null;
    },
  };

  return {
    field: 'name',
    failureReason: 'no_name_found',
    layers: [pattern, entities, llmGuess],
  };
}
