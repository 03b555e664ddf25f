import { describe, it } from 'node:test';
import assert from 'node:assert';

import { createServer, wrapTool } from '../server.js';
import { countTokens, listProjectTemplates, summarize, tokenBudget, truncate } from '../tools/index.js';
import { countTokens as count } from '../tokens/counter.js';

describe('MCP tools', () => {
  it('counts tokens with the model encoding', () => {
    assert.deepStrictEqual(countTokens({ text: 'hello world' }), { model: 'gpt-4o', encoding: 'o200k_base', tokens: 2 });
    assert.deepStrictEqual(countTokens({ text: '', model: 'phi-4' }), { model: 'phi-4', encoding: 'cl100k_base', tokens: 0 });
  });

  it('reports the budget and whether the model is known', () => {
    assert.deepStrictEqual(tokenBudget({ model: 'o3' }), { model: 'o3', known: true, total: 4000, context: 2000, response: 1200 });
    assert.strictEqual(tokenBudget({ model: 'mystery' }).known, false);
  });

  it('leaves short text alone', () => {
    const result = truncate({ text: 'hello', maxTokens: 10 });
    assert.strictEqual(result.text, 'hello');
    assert.strictEqual(result.truncated, false);
  });

  it('truncates long text to the budget', () => {
    const result = truncate({ text: 'word '.repeat(1000), maxTokens: 100 });
    assert.strictEqual(result.truncated, true);
    assert.ok(result.tokens <= 100);
    assert.strictEqual(result.tokens, count(result.text, 'gpt-4o'));
  });

  it('summarizes with the default budget', () => {
    const result = summarize({ output: '# Plan\n\n- one\n- two' });
    assert.deepStrictEqual(result.truncated, false);
    assert.strictEqual(result.text, '# Plan\n\n- one\n- two');
  });

  it('lists templates', () => {
    assert.strictEqual(listProjectTemplates({}).templates.length, 4);
  });
});

describe('wrapTool', () => {
  it('returns the result as JSON text', async () => {
    const handler = wrapTool('double', (args: { x: number }) => ({ doubled: args.x * 2 }));
    assert.deepStrictEqual(await handler({ x: 2 }), {
      content: [{ type: 'text', text: '{\n  "doubled": 4\n}' }],
    });
  });

  it('turns a thrown error into an error result', async () => {
    const handler = wrapTool('broken', (_args: Record<string, never>) => {
      throw new Error('bad input');
    });
    assert.deepStrictEqual(await handler({}), {
      content: [{ type: 'text', text: '{"error":"Error: bad input"}' }],
      isError: true,
    });
  });
});

describe('createServer', () => {
  it('builds a server with the tools registered', () => {
    const server = createServer();
    assert.ok(server);
    assert.strictEqual(typeof server.connect, 'function');
  });
});
