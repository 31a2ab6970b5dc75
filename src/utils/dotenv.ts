/**
 * Reader for dotenv-style `KEY=value` files.
 * Values are returned, never written into process.env.
 */
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { logger } from './logger.js';

export type DotenvValues = Record<string, string>;

/**
 * Parse a dotenv-style file.
 * Supports `KEY=value`, `export KEY=value`, comments and surrounding quotes.
 */
export function parseDotenv(content: string): DotenvValues {
  const values: DotenvValues = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
        (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
      value = value.slice(1, -1);
    }

    if (key) {
      values[key] = value;
    }
  }

  return values;
}

/**
 * Load a dotenv file if present. A missing file yields `{}`;
 * an unreadable one is reported and also yields `{}`.
 */
export async function loadDotenvFile(filePath: string): Promise<DotenvValues> {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    const content = await readFile(filePath, 'utf-8');
    return parseDotenv(content);
  } catch (error) {
    logger.warn(`Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}
