/**
 * Leveled logger for crewsmith.
 * Everything goes to stderr: stdout belongs to CLI output and the MCP protocol.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: DIM,
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

// CREWSMITH_LOG_LEVEL wins; CREWSMITH_DEBUG alone turns on debug
const envLevel = process.env.CREWSMITH_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : (process.env.CREWSMITH_DEBUG ? 'debug' : 'info');

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

  const time = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
  const head = `${LEVEL_COLOR[level]}[${time}] [CREWSMITH] ${level.toUpperCase().padEnd(5)}${RESET}`;
  const tail = data ? ` ${DIM}${JSON.stringify(data)}${RESET}` : '';
  console.error(`${head} ${message}${tail}`);
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    write('debug', message, data);
  },

  info(message: string, data?: Record<string, unknown>): void {
    write('info', message, data);
  },

  warn(message: string, data?: Record<string, unknown>): void {
    write('warn', message, data);
  },

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const details = error instanceof Error
      ? { error: error.message, stack: error.stack }
      : { error: String(error) };
    write('error', message, { ...data, ...details });
  },

  /** An agent picking up a task */
  task(taskId: string, agent: string): void {
    this.info(`Task started: ${taskId}`, { agent });
  },

  /** A task output cut down to fit the context budget */
  truncation(taskId: string, originalTokens: number, storedTokens: number, budget: number): void {
    this.info(`Output of ${taskId} truncated: ${originalTokens} → ${storedTokens} tokens`, { budget });
  },
};
