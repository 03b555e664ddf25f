/**
 * Persists agent outputs into the generated project directory: one markdown
 * report per task, plus every fenced code block that names a file path.
 */

import { existsSync, mkdirSync } from 'fs';
import { dirname, join, relative, resolve, sep } from 'path';
import writeFileAtomic from 'write-file-atomic';
import { logger } from '../logger.js';
import type { PlannedTask } from '../pipeline/plan.js';
import type { RunManifest } from '../pipeline/types.js';
import { resolveInside } from '../security.js';

export const STATE_DIR = '.crewsmith';
export const MANIFEST_FILE = 'run.json';

export interface CodeFile {
  path: string;
  language: string;
  content: string;
}

const FENCE = /^```([^\n`]*)\n([\s\S]*?)^```[ \t]*$/gm;

// Lines such as "File: src/app.ts", "**src/app.ts**", "### `src/app.ts`"
const PATH_LINE = /^(?:#{1,6}\s+)?(?:(?:file|path|filename)\s*:\s*)?[*`]*([\w@.-]+(?:\/[\w@.-]+)*\.[\w-]+|(?:[\w@.-]+\/)*(?:Dockerfile|Makefile))[*`:]*\s*$/i;

function looksLikePath(candidate: string): boolean {
  return /^[\w@.\/-]+$/.test(candidate) && (candidate.includes('.') || candidate.includes('/') || /Dockerfile|Makefile/.test(candidate));
}

function pathFromInfo(info: string): string | null {
  const [, second] = info.trim().split(/\s+/);
  if (second && looksLikePath(second)) return second;
  return null;
}

function pathFromPrecedingLine(before: string): string | null {
  const lines = before.replace(/\s+$/, '').split('\n');
  const last = lines[lines.length - 1]?.trim() ?? '';
  const match = PATH_LINE.exec(last);
  return match?.[1] ?? null;
}

/**
 * Find fenced code blocks that carry a file path, either in the info string
 * (```ts src/server.ts) or on the line right above the fence.
 */
export function extractCodeFiles(markdown: string): CodeFile[] {
  const files: CodeFile[] = [];

  for (const match of markdown.matchAll(FENCE)) {
    const info = match[1] ?? '';
    const body = match[2] ?? '';
    const before = markdown.slice(0, match.index ?? 0);
    const path = pathFromInfo(info) ?? pathFromPrecedingLine(before);
    if (!path) continue;

    files.push({
      path,
      language: info.trim().split(/\s+/)[0] ?? '',
      content: body,
    });
  }

  return files;
}

export class ProjectWriter {
  readonly projectDir: string;

  constructor(projectDir: string) {
    this.projectDir = resolve(projectDir);
  }

  /** Write a file under the project directory; returns its relative path, or null if refused */
  writeFile(relativePath: string, content: string): string | null {
    const target = resolveInside(this.projectDir, relativePath);
    if (!target) {
      logger.warn('Refusing to write outside the project directory', { path: relativePath });
      return null;
    }

    const dir = dirname(target);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileAtomic.sync(target, content);
    return relative(this.projectDir, target).split(sep).join('/');
  }

  /**
   * Write the task's markdown report and the code files it contains.
   * Returns every written path, report first.
   */
  writeTaskOutput(task: PlannedTask, output: string): string[] {
    const written: string[] = [];

    const report = this.writeFile(task.outputFile, `# ${task.title}\n\n${output.trim()}\n`);
    if (report) written.push(report);

    for (const file of extractCodeFiles(output)) {
      const path = join(task.codeDir, stripCodeDirPrefix(file.path, task.codeDir));
      const codePath = this.writeFile(path, file.content);
      if (codePath && !written.includes(codePath)) written.push(codePath);
    }

    logger.debug(`Wrote ${written.length} file(s) for ${task.id}`, { files: written });
    return written;
  }

  writeManifest(manifest: RunManifest): string | null {
    return this.writeFile(`${STATE_DIR}/${MANIFEST_FILE}`, JSON.stringify(manifest, null, 2));
  }
}

// Agents often repeat their own directory: "backend/app.js" inside backend/
function stripCodeDirPrefix(path: string, codeDir: string): string {
  const normalizedDir = codeDir.replace(/^\.\/?/, '').replace(/\/$/, '');
  if (normalizedDir && path.startsWith(`${normalizedDir}/`)) {
    return path.slice(normalizedDir.length + 1);
  }
  return path;
}
