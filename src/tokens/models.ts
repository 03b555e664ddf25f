/**
 * Model profiles: which tokenizer encoding a model uses and how large a
 * request it will accept.
 *
 * Limits are the request sizes that actually went through on the hosted
 * inference endpoint, not the advertised context windows.
 */

export type EncodingName = 'cl100k_base' | 'o200k_base';

export interface ModelProfile {
  encoding: EncodingName;
  /** Total tokens a single request may carry */
  totalLimit: number;
}

export interface ResolvedModelProfile extends ModelProfile {
  id: string;
  /** False when the id is not in the table and defaults were used */
  known: boolean;
}

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_ENCODING: EncodingName = 'cl100k_base';
export const DEFAULT_TOTAL_LIMIT = 4000;

export const MODEL_PROFILES = {
  'gpt-4o': { encoding: 'o200k_base', totalLimit: 8000 },
  'gpt-4o-mini': { encoding: 'o200k_base', totalLimit: 8000 },
  'gpt-4.1': { encoding: 'o200k_base', totalLimit: 8000 },
  'gpt-5-chat': { encoding: 'o200k_base', totalLimit: 4000 },
  'o1-mini': { encoding: 'o200k_base', totalLimit: 4000 },
  'o3': { encoding: 'o200k_base', totalLimit: 4000 },
  'o3-mini': { encoding: 'o200k_base', totalLimit: 4000 },
  // No public tokenizer; cl100k is the closest general-purpose BPE
  'deepseek-r1': { encoding: 'cl100k_base', totalLimit: 4000 },
  'phi-4': { encoding: 'cl100k_base', totalLimit: 4000 },
} as const satisfies Record<string, ModelProfile>;

export type KnownModel = keyof typeof MODEL_PROFILES;

export function isKnownModel(model: string): model is KnownModel {
  return Object.prototype.hasOwnProperty.call(MODEL_PROFILES, model);
}

/**
 * Look up a model. Ids are matched exactly; anything else takes the
 * default encoding and limit and is reported with `known: false`.
 */
export function resolveModelProfile(model: string): ResolvedModelProfile {
  if (isKnownModel(model)) {
    const profile: ModelProfile = MODEL_PROFILES[model];
    return { id: model, ...profile, known: true };
  }

  return {
    id: model,
    encoding: DEFAULT_ENCODING,
    totalLimit: DEFAULT_TOTAL_LIMIT,
    known: false,
  };
}

export function listKnownModels(): KnownModel[] {
  return Object.keys(MODEL_PROFILES).filter(isKnownModel);
}
