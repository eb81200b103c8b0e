import type { TopicPreference, TopicPreferences } from './contactMapping';
import { InvalidOptionsError } from './errors';
import type { ConversionOptions } from './options';

export const USAGE = `Usage: convert-mailchimp-to-ses <input.csv> <output.csv> [options]

Options:
  --topic "<name>=<opt_in|opt_out>"  add a topicPreferences.<name> column (repeatable, kept in order)
  --skip-malformed                   skip rows that fail CSV decoding instead of aborting
  --help                             show this message`;

export type ConvertCommand =
  | { kind: 'help' }
  | { kind: 'convert'; inputPath: string; outputPath: string; options: ConversionOptions };

// Accepts opt_in, OPT_IN, opt-in, optin (and the same for opt_out).
export function parseTopicPreference(raw: string): TopicPreference | null {
  const token = raw.trim().toLowerCase().replace(/[-\s]/g, '_');
  if (token === 'opt_in' || token === 'optin') return 'opt_in';
  if (token === 'opt_out' || token === 'optout') return 'opt_out';
  return null;
}

// Split on the last "=" so topic names may themselves contain "=".
function parseTopicFlag(value: string): [string, TopicPreference] | string {
  const idx = value.lastIndexOf('=');
  if (idx <= 0) return `--topic expects "<name>=<opt_in|opt_out>", got "${value}"`;
  const name = value.slice(0, idx);
  const pref = parseTopicPreference(value.slice(idx + 1));
  if (!pref) return `--topic "${name}": unknown preference "${value.slice(idx + 1)}"`;
  return [name, pref];
}

export function parseConvertArgs(argv: string[]): ConvertCommand {
  const positional: string[] = [];
  const topicPreferences: TopicPreferences = [];
  const issues: string[] = [];
  let skipMalformedRows = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--skip-malformed') {
      skipMalformedRows = true;
    } else if (arg === '--topic' || arg.startsWith('--topic=')) {
      const value: string | undefined = arg === '--topic' ? argv[++i] : arg.slice('--topic='.length);
      if (value === undefined) {
        issues.push('--topic requires a value');
        continue;
      }
      const parsed = parseTopicFlag(value);
      if (typeof parsed === 'string') issues.push(parsed);
      else topicPreferences.push(parsed);
    } else if (arg.startsWith('--')) {
      issues.push(`unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) issues.push(`expected <input.csv> <output.csv>, got ${positional.length} path(s)`);
  if (issues.length > 0) throw new InvalidOptionsError(issues);

  const [inputPath, outputPath] = positional;
  return { kind: 'convert', inputPath, outputPath, options: { topicPreferences, skipMalformedRows } };
}
