import { z } from 'zod';
import type { TopicPreferences } from './contactMapping';
import { InvalidOptionsError } from './errors';

export const conversionOptionsSchema = z
  .object({
    topicPreferences: z
      .array(z.tuple([z.string().min(1, 'topic name must not be empty'), z.enum(['opt_in', 'opt_out'])]))
      .default([]),
    skipMalformedRows: z.boolean().default(false),
  })
  .strict();

export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>;

export interface ConversionOptions {
  topicPreferences: TopicPreferences;
  skipMalformedRows: boolean;
}

export function parseConversionOptions(input: unknown = {}): ConversionOptions {
  const parsed = conversionOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
  return parsed.data;
}
