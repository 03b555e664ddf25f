/**
 * Truncation and summarization of task outputs to a token budget.
 *
 * Both passes keep the beginning and the end of a text and drop the middle:
 * LLM-written reports put their framing up front and their conclusions at
 * the end. An elision marker always records what was dropped.
 *
 * Nothing here throws. A tokenizer failure switches the token pass to a
 * character-proportional cut whose budget is only approximate.
 */

import { z } from 'zod';
import { logger } from '../logger.js';
import { defaultAccountant, type TokenAccountant } from './counter.js';
import { DEFAULT_MODEL } from './models.js';

export const DEFAULT_SUMMARY_TOKENS = 1500;

const splitSchema = z.object({
  head: z.number().min(0).max(1),
  tail: z.number().min(0).max(1),
}).refine(s => s.head + s.tail <= 1);

export type RetentionSplit = z.infer<typeof splitSchema>;

/** Token pass: 60% of the budget for the head, 40% for the tail */
export const DEFAULT_TOKEN_SPLIT: RetentionSplit = { head: 0.6, tail: 0.4 };

/** Line pass: first 40% and last 40% of lines, the middle 20% is dropped */
export const DEFAULT_LINE_SPLIT: RetentionSplit = { head: 0.4, tail: 0.4 };

export interface TruncationOptions {
  accountant?: TokenAccountant;
  tokenSplit?: RetentionSplit;
  /**
   * Count the marker against the budget so the result stays within it.
   * When false, head and tail take the whole budget and the marker comes on top.
   */
  reserveMarker?: boolean;
}

export interface SummarizeOptions extends TruncationOptions {
  lineSplit?: RetentionSplit;
}

function resolveSplit(split: RetentionSplit | undefined, fallback: RetentionSplit): RetentionSplit {
  if (!split) return fallback;
  const parsed = splitSchema.safeParse(split);
  if (parsed.success) return parsed.data;
  logger.warn('Ignoring invalid retention split, using default', { split, fallback });
  return fallback;
}

function normalizeBudget(maxTokens: number): number {
  return Number.isNaN(maxTokens) ? 0 : Math.max(0, Math.floor(maxTokens));
}

export function truncationMarker(originalTokens: number, targetTokens: number, approximate = false): string {
  const approx = approximate ? '~' : '';
  return `\n\n[... Content truncated: ${approx}${originalTokens} tokens → ${approx}${targetTokens} tokens ...]\n\n`;
}

export function sectionMarker(targetTokens: number): string {
  return `[... Middle section truncated to fit ${targetTokens} token limit ...]`;
}

/** Start index of the last `count` items; slice(-0) would keep everything */
function tailStart(length: number, count: number): number {
  return Math.max(0, length - count);
}

/**
 * Cut `text` down to roughly `maxTokens` tokens, keeping its head and tail.
 * Text already within budget is returned unchanged.
 */
export function truncateToTokenLimit(
  text: string,
  maxTokens: number,
  model: string = DEFAULT_MODEL,
  options: TruncationOptions = {},
): string {
  const accountant = options.accountant ?? defaultAccountant;
  const budget = normalizeBudget(maxTokens);
  const currentTokens = accountant.countTokens(text, model);

  if (currentTokens <= budget) {
    return text;
  }

  const split = resolveSplit(options.tokenSplit, DEFAULT_TOKEN_SPLIT);
  const reserveMarker = options.reserveMarker ?? true;

  try {
    const tokenizer = accountant.tokenizerFor(model);
    const tokens = tokenizer.encode(text);
    const marker = truncationMarker(currentTokens, budget);
    const available = reserveMarker
      ? Math.max(0, budget - accountant.countTokens(marker, model))
      : budget;

    const head = tokenizer.decode(tokens.slice(0, Math.floor(available * split.head)));
    const tail = tokenizer.decode(tokens.slice(tailStart(tokens.length, Math.floor(available * split.tail))));

    return head + marker + tail;
  } catch (error) {
    logger.debug('Token truncation failed, cutting by characters', {
      model,
      reason: error instanceof Error ? error.message : String(error),
    });
    return truncateByCharacters(text, currentTokens, budget, split, reserveMarker, accountant, model);
  }
}

function truncateByCharacters(
  text: string,
  currentTokens: number,
  budget: number,
  split: RetentionSplit,
  reserveMarker: boolean,
  accountant: TokenAccountant,
  model: string,
): string {
  const marker = truncationMarker(currentTokens, budget, true);
  const available = reserveMarker
    ? Math.max(0, budget - accountant.countTokens(marker, model))
    : budget;

  // Code points, so a cut never splits a surrogate pair
  const chars = Array.from(text);
  const charsPerToken = chars.length / currentTokens;
  const maxChars = Math.floor(available * charsPerToken);

  const head = chars.slice(0, Math.floor(maxChars * split.head)).join('');
  const tail = chars.slice(tailStart(chars.length, Math.floor(maxChars * split.tail))).join('');

  return head + marker + tail;
}

/**
 * Reduce a task output to `maxTokens`, working on whole lines first so
 * headings and bullets survive intact, then falling back to the token pass
 * if the line cut is still too large.
 */
export function summarizeTaskOutput(
  output: string,
  maxTokens: number = DEFAULT_SUMMARY_TOKENS,
  model: string = DEFAULT_MODEL,
  options: SummarizeOptions = {},
): string {
  const accountant = options.accountant ?? defaultAccountant;
  const budget = normalizeBudget(maxTokens);

  if (accountant.countTokens(output, model) <= budget) {
    return output;
  }

  const split = resolveSplit(options.lineSplit, DEFAULT_LINE_SPLIT);
  const lines = output.split('\n');
  const keepStart = Math.floor(lines.length * split.head);
  const keepEnd = Math.floor(lines.length * split.tail);

  // Too few lines to cut around; a line pass would keep only the marker
  if (keepStart + keepEnd === 0) {
    return truncateToTokenLimit(output, budget, model, options);
  }

  const summary = [
    ...lines.slice(0, keepStart),
    sectionMarker(budget),
    ...lines.slice(tailStart(lines.length, keepEnd)),
  ].join('\n');

  if (accountant.countTokens(summary, model) <= budget) {
    return summary;
  }

  return truncateToTokenLimit(summary, budget, model, options);
}
