import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  AGENT_PROFILES,
  AGENT_ROLES,
  RECOMMENDED_MODELS,
  buildSystemPrompt,
  getAgentProfile,
  getBestModelForAgent,
  isAgentRole,
  modelOverrideVar,
} from '../agents/index.js';
import { isKnownModel } from '../tokens/models.js';

describe('Agents', () => {
  it('has a profile for every role, keyed by that role', () => {
    for (const role of AGENT_ROLES) {
      assert.strictEqual(AGENT_PROFILES[role].key, role);
      assert.ok(AGENT_PROFILES[role].goal.length > 0);
    }
  });

  it('recommends a model with a known budget for every role', () => {
    for (const role of AGENT_ROLES) {
      assert.ok(isKnownModel(RECOMMENDED_MODELS[role]), role);
    }
  });

  it('recognises roles', () => {
    assert.strictEqual(isAgentRole('devops'), true);
    assert.strictEqual(isAgentRole('designer'), false);
  });

  it('names the override variable after the role', () => {
    assert.strictEqual(modelOverrideVar('business_analyst'), 'BUSINESS_ANALYST_MODEL');
    assert.strictEqual(modelOverrideVar('qa'), 'QA_MODEL');
  });

  it('picks the recommended model unless overridden', () => {
    assert.strictEqual(getBestModelForAgent('devops', {}), 'deepseek-r1');
    assert.strictEqual(getBestModelForAgent('devops', { DEVOPS_MODEL: 'gpt-4o' }), 'gpt-4o');
    assert.strictEqual(getBestModelForAgent('devops', { DEVOPS_MODEL: '' }), 'deepseek-r1');
  });

  it('builds a system prompt from the profile', () => {
    const profile = getAgentProfile('qa');
    const prompt = buildSystemPrompt(profile);

    assert.ok(prompt.startsWith(`You are a ${profile.role}.\n\nGoal: ${profile.goal}`));
    assert.ok(prompt.includes(profile.backstory));
    assert.ok(prompt.includes('```ts src/server.ts'));
  });
});
