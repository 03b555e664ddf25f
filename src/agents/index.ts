import { AGENT_PROFILES, AGENT_ROLES, type AgentProfile, type AgentRole } from './profiles.js';

export { AGENT_PROFILES, AGENT_ROLES, type AgentProfile, type AgentRole };

/**
 * Models that did best per role when each was tried on that role's tasks.
 */
export const RECOMMENDED_MODELS: Record<AgentRole, string> = {
  business_analyst: 'o3',
  project_manager: 'gpt-5-chat',
  backend: 'gpt-4.1',
  frontend: 'gpt-4.1',
  devops: 'deepseek-r1',
  qa: 'o3-mini',
};

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some(role => role === value);
}

export function getAgentProfile(role: AgentRole): AgentProfile {
  return AGENT_PROFILES[role];
}

/** Env var that overrides the model for a role, e.g. BACKEND_MODEL */
export function modelOverrideVar(role: AgentRole): string {
  return `${role.toUpperCase()}_MODEL`;
}

export function getBestModelForAgent(
  role: AgentRole,
  env: Record<string, string | undefined> = process.env,
): string {
  return env[modelOverrideVar(role)] || RECOMMENDED_MODELS[role];
}

export function buildSystemPrompt(profile: AgentProfile): string {
  return `You are a ${profile.role}.

Goal: ${profile.goal}

${profile.backstory}

When you produce source files, put each one in its own fenced code block whose
info string is the language followed by the file path relative to your output
directory, for example \`\`\`ts src/server.ts`;
}
