import { existsSync, readFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { logger } from './logger.js';

// Supported LLM providers. GitHub Models speaks the OpenAI chat format.
export const PROVIDERS = ['github', 'openai', 'anthropic'] as const;
export type LLMProvider = typeof PROVIDERS[number];

export function isLLMProvider(value: string): value is LLMProvider {
  return PROVIDERS.some(provider => provider === value);
}

export const DEFAULT_MODEL_NAME = 'gpt-4.1';
export const DEFAULT_MAX_TOKENS = 4000;
export const DEFAULT_TEMPERATURE = 0.7;

const ENV_KEYS: Record<LLMProvider, string> = {
  github: 'GITHUB_TOKEN',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const configSchema = z.object({
  provider: z.enum(PROVIDERS).optional(),
  githubToken: z.string().optional(),
  openaiApiKey: z.string().optional(),
  anthropicApiKey: z.string().optional(),
  defaultModel: z.string().optional(),
  createdAt: z.string().optional(),
  lastUsed: z.string().optional(),
});

export type CrewsmithConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  return env.CREWSMITH_HOME || join(homedir(), '.crewsmith');
}

export function getConfigPath(env: Env = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

function freshConfig(): CrewsmithConfig {
  const now = new Date().toISOString();
  return { createdAt: now, lastUsed: now };
}

export function loadConfig(env: Env = process.env): CrewsmithConfig {
  const configFile = getConfigPath(env);

  if (!existsSync(configFile)) {
    return freshConfig();
  }

  try {
    const parsed = configSchema.safeParse(JSON.parse(readFileSync(configFile, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn('Ignoring malformed config file', { path: configFile, issues: parsed.error.issues.length });
  } catch (error) {
    logger.warn('Could not read config file', {
      path: configFile,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return freshConfig();
}

export function saveConfig(config: CrewsmithConfig, env: Env = process.env): void {
  const dir = getConfigDir(env);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  config.lastUsed = new Date().toISOString();
  writeFileAtomic.sync(getConfigPath(env), JSON.stringify(config, null, 2));
}

function storedKey(config: CrewsmithConfig, provider: LLMProvider): string | undefined {
  switch (provider) {
    case 'github': return config.githubToken;
    case 'openai': return config.openaiApiKey;
    case 'anthropic': return config.anthropicApiKey;
  }
}

// Env var first, then config file
export function getProviderApiKey(provider: LLMProvider, env: Env = process.env): string | undefined {
  const envKey = env[ENV_KEYS[provider]];
  if (envKey) return envKey;
  return storedKey(loadConfig(env), provider);
}

export function setProviderApiKey(provider: LLMProvider, apiKey: string, env: Env = process.env): void {
  const config = loadConfig(env);
  switch (provider) {
    case 'github': config.githubToken = apiKey; break;
    case 'openai': config.openaiApiKey = apiKey; break;
    case 'anthropic': config.anthropicApiKey = apiKey; break;
  }
  saveConfig(config, env);
}

export function listConfiguredProviders(env: Env = process.env): LLMProvider[] {
  return PROVIDERS.filter(p => !!getProviderApiKey(p, env));
}

export function hasAnyProvider(env: Env = process.env): boolean {
  return listConfiguredProviders(env).length > 0;
}

/**
 * Provider to use: CREWSMITH_PROVIDER, then the config file, then the first
 * provider with a key (GitHub preferred), then GitHub.
 */
export function getActiveProvider(env: Env = process.env): LLMProvider {
  const fromEnv = z.enum(PROVIDERS).safeParse(env.CREWSMITH_PROVIDER);
  if (fromEnv.success) return fromEnv.data;

  const config = loadConfig(env);
  if (config.provider) return config.provider;

  return listConfiguredProviders(env)[0] ?? 'github';
}

export function getDefaultModel(env: Env = process.env): string {
  return env.CREWSMITH_MODEL || loadConfig(env).defaultModel || DEFAULT_MODEL_NAME;
}

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface GenerationSettings {
  maxTokens: number;
  temperature: number;
}

export function getGenerationSettings(env: Env = process.env): GenerationSettings {
  return {
    maxTokens: readNumber(env.LLM_MAX_TOKENS, DEFAULT_MAX_TOKENS),
    temperature: readNumber(env.LLM_TEMPERATURE, DEFAULT_TEMPERATURE),
  };
}

export function getProviderInfo(provider: LLMProvider): { name: string; envVar: string; url: string } {
  switch (provider) {
    case 'github':
      return { name: 'GitHub Models', envVar: ENV_KEYS.github, url: 'github.com/settings/tokens' };
    case 'openai':
      return { name: 'OpenAI', envVar: ENV_KEYS.openai, url: 'platform.openai.com' };
    case 'anthropic':
      return { name: 'Anthropic', envVar: ENV_KEYS.anthropic, url: 'console.anthropic.com' };
  }
}
