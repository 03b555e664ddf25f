/**
 * Shared test doubles. One character is one token, so budgets can be
 * checked with plain string lengths.
 */

import { TokenAccountant, type Tokenizer } from '../tokens/counter.js';

export const charTokenizer: Tokenizer = {
  encode: text => Array.from(text, ch => ch.codePointAt(0) ?? 0),
  decode: tokens => String.fromCodePoint(...tokens),
};

export const charAccountant = new TokenAccountant(() => charTokenizer);

/** Counting works (by estimate), encoding does not */
export const brokenAccountant = new TokenAccountant(() => ({
  encode: () => { throw new Error('encoding not loaded'); },
  decode: () => { throw new Error('encoding not loaded'); },
}));

export function tokenLength(text: string): number {
  return Array.from(text).length;
}
