import { readFile, writeFile } from 'fs/promises';
import { parse } from 'dotenv';
import { ResourceError } from '../errors.js';

function formatValue(value: string): string {
  return /[\s#"'=]/.test(value) || value === '' ? JSON.stringify(value) : value;
}

/**
 * Drops scale-related overrides from the session env file so they do not
 * fight the theme file. The file is only rewritten when a key was removed.
 *
 * @returns the keys that were removed
 */
export async function cleanUpUserEnv(file: string, keys: readonly string[]): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return [];
    }
    throw new ResourceError('env', `Failed to read ${file}`, { cause: e });
  }

  const env = parse(content);
  const removed = keys.filter((key) => key in env);
  if (removed.length === 0) {
    return [];
  }

  for (const key of removed) {
    delete env[key];
  }

  const lines = Object.entries(env).map(([key, value]) => `${key}=${formatValue(value)}`);
  try {
    await writeFile(file, lines.length > 0 ? lines.join('\n') + '\n' : '');
  } catch (e) {
    throw new ResourceError('env', `Failed to write ${file}`, { cause: e });
  }
  return removed;
}
