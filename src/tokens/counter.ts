/**
 * Token counting per model.
 *
 * Counting never throws: when an encoding cannot be loaded or rejects the
 * input, the count falls back to the ~4 characters per token estimate.
 */

import * as cl100k from 'gpt-tokenizer/encoding/cl100k_base';
import * as o200k from 'gpt-tokenizer/encoding/o200k_base';
import { logger } from '../logger.js';
import { resolveModelProfile, type EncodingName } from './models.js';

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export type TokenizerResolver = (encoding: EncodingName) => Tokenizer;

// Special-token literals such as <|endoftext|> in agent output are plain text
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

const ENCODINGS: Record<EncodingName, Tokenizer> = {
  cl100k_base: {
    encode: (text) => cl100k.encode(text, PLAIN_TEXT),
    decode: (tokens) => cl100k.decode(tokens),
  },
  o200k_base: {
    encode: (text) => o200k.encode(text, PLAIN_TEXT),
    decode: (tokens) => o200k.decode(tokens),
  },
};

export const defaultTokenizerResolver: TokenizerResolver = (encoding) => ENCODINGS[encoding];

/**
 * Character heuristic used whenever a real tokenizer is unavailable.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export class TokenAccountant {
  constructor(private readonly resolveTokenizer: TokenizerResolver = defaultTokenizerResolver) {}

  /** Tokenizer for the encoding `model` maps to. May throw. */
  tokenizerFor(model: string): Tokenizer {
    return this.resolveTokenizer(resolveModelProfile(model).encoding);
  }

  countTokens(text: string, model: string): number {
    try {
      return this.tokenizerFor(model).encode(text).length;
    } catch (error) {
      logger.debug('Tokenizer unavailable, estimating from characters', {
        model,
        reason: error instanceof Error ? error.message : String(error),
      });
      return estimateTokens(text);
    }
  }
}

export const defaultAccountant = new TokenAccountant();

export function countTokens(text: string, model: string, accountant: TokenAccountant = defaultAccountant): number {
  return accountant.countTokens(text, model);
}
