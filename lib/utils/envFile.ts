import { readFileSync } from 'fs';
import { resolve } from 'path';

const isMissingFile = (err: unknown) => err instanceof Error && 'code' in err && err.code === 'ENOENT';

const ENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

/** Parse dotenv-style text into pairs. Matching outer quotes are removed. */
export function parseEnvText(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const match = ENV_LINE.exec(line);
    if (!match) continue;
    const [, key, raw] = match;
    const quoted = raw.length >= 2 && (raw[0] === '"' || raw[0] === "'") && raw.endsWith(raw[0]);
    entries.set(key, quoted ? raw.slice(1, -1) : raw);
  }
  return entries;
}

// Variables already set in the environment win over the file.
export function loadEnvFile(path: string): boolean {
  let text: string;
  try {
    text = readFileSync(resolve(path), 'utf-8');
  } catch (err) {
    if (!isMissingFile(err)) console.warn('Could not load env file', path, err instanceof Error ? err.message : err);
    return false;
  }
  parseEnvText(text).forEach((value, key) => {
    if (!process.env[key]) process.env[key] = value;
  });
  return true;
}
