import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

// package.json sits one level above both src/ and dist/
export const PACKAGE_JSON_PATH = fileURLToPath(new URL('../package.json', import.meta.url));

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('package.json not readable, version unknown', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return '0.0.0';
}

export const VERSION = readVersion();
