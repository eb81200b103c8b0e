import { describe, it, expect } from 'vitest';
import { parseConversionOptions } from '../options';
import { InvalidOptionsError } from '../errors';

const issuesOf = (input: unknown): string[] => {
  try {
    parseConversionOptions(input);
  } catch (err) {
    if (err instanceof InvalidOptionsError) return err.issues;
    throw err;
  }
  return [];
};

describe('parseConversionOptions', () => {
  it('fills defaults when nothing is passed', () => {
    expect(parseConversionOptions()).toEqual({ topicPreferences: [], skipMalformedRows: false });
    expect(parseConversionOptions(null)).toEqual({ topicPreferences: [], skipMalformedRows: false });
  });

  it('accepts ordered topic preferences', () => {
    expect(
      parseConversionOptions({
        topicPreferences: [
          ['Weekly Digest', 'opt_in'],
          ['Promotions', 'opt_out'],
        ],
        skipMalformedRows: true,
      })
    ).toEqual({
      topicPreferences: [
        ['Weekly Digest', 'opt_in'],
        ['Promotions', 'opt_out'],
      ],
      skipMalformedRows: true,
    });
  });

  it('rejects an empty topic name with its path', () => {
    expect(issuesOf({ topicPreferences: [['', 'opt_in']] })).toEqual([
      'topicPreferences.0.0: topic name must not be empty',
    ]);
  });

  it('rejects an unknown preference', () => {
    const issues = issuesOf({ topicPreferences: [['News', 'OPT_IN']] });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('topicPreferences.0.1: ')).toBe(true);
  });

  it('rejects unknown option keys', () => {
    expect(issuesOf({ topics: [] })).toEqual(["Unrecognized key(s) in object: 'topics'"]);
  });
});
