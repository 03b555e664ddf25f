import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';

import { PipelineError } from '../errors.js';
import { buildTaskPrompt, createProject, pickContextModel, runPipeline } from '../pipeline/driver.js';
import { buildTaskPlan, type PlannedTask, type ProjectBrief } from '../pipeline/plan.js';
import type { AgentExecutor, AgentInvocation, RunManifest } from '../pipeline/types.js';
import { CONTEXT_SEPARATOR, TaskOutputStore } from '../tokens/task-output-store.js';
import { ProjectWriter } from '../output/writer.js';
import { charAccountant, tokenLength } from './fixtures.js';

const SHOP: ProjectBrief = { name: 'Clothing Store', type: 'ecommerce', description: 'Sells shirts' };

class FakeExecutor implements AgentExecutor {
  readonly calls: AgentInvocation[] = [];

  constructor(private readonly reply: (invocation: AgentInvocation) => string = inv => `Output of ${inv.task.id}`) {}

  async run(invocation: AgentInvocation): Promise<string> {
    this.calls.push(invocation);
    return this.reply(invocation);
  }
}

class FailingWriter extends ProjectWriter {
  readonly manifests: RunManifest[] = [];

  constructor(dir: string, private readonly failOn: 'files' | 'manifest') {
    super(dir);
  }

  override writeTaskOutput(task: PlannedTask, output: string): string[] {
    if (this.failOn === 'files') throw new Error('EACCES: permission denied');
    return super.writeTaskOutput(task, output);
  }

  override writeManifest(manifest: RunManifest): string | null {
    if (this.failOn === 'manifest') throw new Error('ENOSPC: no space left on device');
    this.manifests.push(structuredClone(manifest));
    return super.writeManifest(manifest);
  }
}

function promptFor(executor: FakeExecutor, taskId: string): string {
  const call = executor.calls.find(c => c.task.id === taskId);
  if (!call) throw new Error(`task ${taskId} never ran`);
  return call.prompt;
}

describe('buildTaskPrompt', () => {
  const [planning] = buildTaskPlan(SHOP);

  it('omits the context section when there is none', () => {
    assert.ok(planning);
    const prompt = buildTaskPrompt(planning, '');
    assert.ok(prompt.startsWith('# Project planning\n\nCreate a project plan for: Clothing Store'));
    assert.ok(prompt.endsWith('Expected output: Project plan with timeline, milestones and risk assessment'));
  });

  it('appends prior outputs under a heading', () => {
    assert.ok(planning);
    const prompt = buildTaskPrompt(planning, 'earlier work');
    assert.ok(prompt.endsWith('\n\n## Context from previous tasks\n\nearlier work'));
  });
});

describe('pickContextModel', () => {
  it('picks the agent model with the smallest limit', () => {
    const plan = buildTaskPlan(SHOP);
    const model = pickContextModel(plan, role => (role === 'qa' ? 'o3-mini' : 'gpt-4o'));
    assert.strictEqual(model, 'o3-mini');
  });

  it('keeps the first model when limits tie', () => {
    const plan = buildTaskPlan(SHOP);
    assert.strictEqual(pickContextModel(plan, role => (role === 'project_manager' ? 'gpt-4.1' : 'gpt-4o')), 'gpt-4.1');
  });
});

describe('runPipeline', () => {
  it('runs every task in order and forwards stored context', async () => {
    const executor = new FakeExecutor();
    const store = new TaskOutputStore('o3', { accountant: charAccountant });

    const result = await runPipeline({ project: SHOP, executor, store, resolveModel: () => 'o3', accountant: charAccountant });

    assert.deepStrictEqual(executor.calls.map(c => c.task.id), [
      'planning', 'requirements', 'backend', 'frontend', 'testing', 'deployment', 'handoff',
    ]);
    assert.ok(promptFor(executor, 'requirements').endsWith('## Context from previous tasks\n\nOutput of planning'));
    assert.ok(promptFor(executor, 'frontend').endsWith(`Output of requirements${CONTEXT_SEPARATOR}Output of backend`));
    assert.ok(!promptFor(executor, 'planning').includes('## Context from previous tasks'));

    assert.strictEqual(result.manifest.status, 'completed');
    assert.strictEqual(result.manifest.tasks.length, 7);
    assert.strictEqual(result.outputs.get('testing'), 'Output of testing');
    assert.deepStrictEqual(result.files, []);
  });

  it('asks each agent for the response budget of its model', async () => {
    const executor = new FakeExecutor();
    const store = new TaskOutputStore('o3', { accountant: charAccountant });

    await runPipeline({
      project: SHOP,
      executor,
      store,
      resolveModel: role => (role === 'backend' ? 'gpt-4o' : 'o3'),
    });

    const budgets = Object.fromEntries(executor.calls.map(c => [c.task.id, c.maxTokens]));
    assert.strictEqual(budgets.backend, 2400);
    assert.strictEqual(budgets.planning, 1200);
    assert.strictEqual(executor.calls[0]?.systemPrompt.startsWith('You are a Senior Project Manager.'), true);
  });

  it('cuts oversized outputs before forwarding them', async () => {
    const executor = new FakeExecutor(inv => (inv.task.id === 'planning' ? 'p'.repeat(5000) : 'ok'));
    const store = new TaskOutputStore('o3', { accountant: charAccountant });

    const result = await runPipeline({ project: SHOP, executor, store, resolveModel: () => 'o3', accountant: charAccountant });

    const planning = result.manifest.tasks[0];
    assert.strictEqual(planning?.truncated, true);
    assert.strictEqual(planning?.outputTokens, 5000);
    assert.ok((planning?.storedTokens ?? Infinity) <= 2000);
    assert.strictEqual(result.manifest.tasks[1]?.contextTokens, planning?.storedTokens);
    assert.strictEqual(result.outputs.get('planning'), 'p'.repeat(5000));

    const context = promptFor(executor, 'requirements').split('## Context from previous tasks\n\n')[1] ?? '';
    assert.ok(tokenLength(context) <= 2000);
  });

  it('reports progress through the callbacks', async () => {
    const started: string[] = [];
    const completed: string[] = [];
    const plan = buildTaskPlan({ name: 'API', type: 'api', description: '' });

    await runPipeline({
      project: { name: 'API', type: 'api', description: '' },
      plan,
      executor: new FakeExecutor(),
      store: new TaskOutputStore('o3', { accountant: charAccountant }),
      resolveModel: () => 'o3',
      onTaskStart: (task, index, total) => started.push(`${index + 1}/${total} ${task.id}`),
      onTaskComplete: record => completed.push(record.taskId),
    });

    assert.deepStrictEqual(started, [
      '1/6 planning', '2/6 requirements', '3/6 backend', '4/6 testing', '5/6 deployment', '6/6 handoff',
    ]);
    assert.deepStrictEqual(completed, ['planning', 'requirements', 'backend', 'testing', 'deployment', 'handoff']);
  });

  describe('with a project directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'crewsmith-driver-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('stops at the failing task and records it', async () => {
      const executor = new FakeExecutor(inv => {
        if (inv.task.id === 'backend') throw new Error('rate limited');
        return 'fine';
      });
      const writer = new ProjectWriter(dir);

      await assert.rejects(
        runPipeline({
          project: SHOP,
          executor,
          store: new TaskOutputStore('o3', { accountant: charAccountant }),
          writer,
          resolveModel: () => 'o3',
        }),
        (error: unknown) => {
          assert.ok(error instanceof PipelineError);
          assert.strictEqual(error.taskId, 'backend');
          assert.strictEqual(error.message, 'Task backend failed: rate limited');
          return true;
        }
      );

      assert.deepStrictEqual(executor.calls.map(c => c.task.id), ['planning', 'requirements', 'backend']);
      const manifest: unknown = JSON.parse(readFileSync(join(dir, '.crewsmith/run.json'), 'utf-8'));
      assert.ok(typeof manifest === 'object' && manifest !== null);
      assert.ok('status' in manifest && manifest.status === 'failed');
      assert.ok('failedTask' in manifest && manifest.failedTask === 'backend');
      assert.ok('error' in manifest && manifest.error === 'rate limited');
    });

    it('fails the run when task files cannot be written', async () => {
      const executor = new FakeExecutor();
      const writer = new FailingWriter(dir, 'files');

      await assert.rejects(
        runPipeline({
          project: SHOP,
          executor,
          store: new TaskOutputStore('o3', { accountant: charAccountant }),
          writer,
          resolveModel: () => 'o3',
        }),
        (error: unknown) => {
          assert.ok(error instanceof PipelineError);
          assert.strictEqual(error.taskId, 'planning');
          assert.strictEqual(error.message, 'Task planning failed: EACCES: permission denied');
          return true;
        }
      );

      assert.deepStrictEqual(executor.calls.map(c => c.task.id), ['planning']);
      const last = writer.manifests.at(-1);
      assert.strictEqual(last?.status, 'failed');
      assert.strictEqual(last?.failedTask, 'planning');
      assert.strictEqual(last?.error, 'EACCES: permission denied');
    });

    it('keeps the agent error when the manifest cannot be written', async () => {
      const logError = mock.method(console, 'error', () => undefined);
      const executor = new FakeExecutor(() => { throw new Error('rate limited'); });

      try {
        await assert.rejects(
          runPipeline({
            project: SHOP,
            executor,
            store: new TaskOutputStore('o3', { accountant: charAccountant }),
            writer: new FailingWriter(dir, 'manifest'),
            resolveModel: () => 'o3',
          }),
          (error: unknown) => {
            assert.ok(error instanceof PipelineError);
            assert.strictEqual(error.message, 'Task planning failed: rate limited');
            return true;
          }
        );
        const recorded = logError.mock.calls.filter(call => String(call.arguments[0]).includes('Could not record the failed run'));
        assert.strictEqual(recorded.length, 1);
      } finally {
        logError.mock.restore();
      }
    });

    it('creates the project under its slug', async () => {
      const executor = new FakeExecutor(inv => (inv.task.id === 'backend'
        ? "API ready.\n\n```js backend/app.js\nconsole.log('hi');\n```"
        : `Output of ${inv.task.id}`));

      const result = await createProject({ project: SHOP, outputDir: dir, model: 'gpt-4o', executor });

      assert.strictEqual(result.projectDir, resolve(dir, 'clothing-store'));
      assert.strictEqual(result.manifest.contextModel, 'gpt-4o');
      assert.deepStrictEqual(result.files, [
        'docs/PROJECT_PLAN.md',
        'docs/REQUIREMENTS.md',
        'docs/BACKEND.md',
        'backend/app.js',
        'docs/FRONTEND.md',
        'docs/TEST_PLAN.md',
        'docs/DEPLOYMENT.md',
        'README.md',
      ]);
      assert.strictEqual(readFileSync(join(result.projectDir, 'backend/app.js'), 'utf-8'), "console.log('hi');\n");
      assert.strictEqual(readFileSync(join(result.projectDir, 'README.md'), 'utf-8'), '# Documentation and handoff\n\nOutput of handoff\n');
      assert.ok(existsSync(join(result.projectDir, '.crewsmith/run.json')));
      assert.ok(executor.calls.every(c => c.model === 'gpt-4o'));
    });
  });
});
