export {
  DEFAULT_MODEL,
  DEFAULT_ENCODING,
  DEFAULT_TOTAL_LIMIT,
  MODEL_PROFILES,
  isKnownModel,
  listKnownModels,
  resolveModelProfile,
  type EncodingName,
  type KnownModel,
  type ModelProfile,
  type ResolvedModelProfile,
} from './models.js';

export {
  TokenAccountant,
  countTokens,
  defaultAccountant,
  defaultTokenizerResolver,
  estimateTokens,
  type Tokenizer,
  type TokenizerResolver,
} from './counter.js';

export {
  DEFAULT_BUDGET_RATIOS,
  budgetRatiosSchema,
  getSafeTokenLimit,
  type BudgetRatios,
  type TokenBudget,
} from './budget.js';

export {
  DEFAULT_LINE_SPLIT,
  DEFAULT_SUMMARY_TOKENS,
  DEFAULT_TOKEN_SPLIT,
  sectionMarker,
  summarizeTaskOutput,
  truncateToTokenLimit,
  truncationMarker,
  type RetentionSplit,
  type SummarizeOptions,
  type TruncationOptions,
} from './truncate.js';

export {
  CONTEXT_SEPARATOR,
  TaskOutputStore,
  type TaskId,
  type TaskOutputStoreOptions,
  type TruncationEvent,
} from './task-output-store.js';
