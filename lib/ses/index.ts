// Core
export { convertMailchimpToSes, formatCsvLine } from './converter';
export type { ConvertResult } from './converter';

// Mapping
export {
  buildSesContactSchema,
  mapContactToSesRow,
  topicColumn,
  MAILCHIMP_COLUMNS,
  MAILCHIMP_EMAIL_COLUMN,
  SES_BASE_COLUMNS,
  SES_TOPIC_COLUMN_PREFIX,
  TOPIC_VALUES,
} from './contactMapping';
export type {
  MailchimpColumn,
  MailchimpContactRow,
  SesContactRow,
  SesContactSchema,
  SesTopicValue,
  TopicPreference,
  TopicPreferences,
} from './contactMapping';

// Options
export { conversionOptionsSchema, parseConversionOptions } from './options';
export type { ConversionOptions, ConversionOptionsInput } from './options';

// Errors
export {
  ConversionError,
  DecodeError,
  InputNotFoundError,
  InvalidOptionsError,
  MalformedRowError,
  OutputWriteFailedError,
  toConversionError,
} from './errors';
export type { ConversionErrorCode } from './errors';
