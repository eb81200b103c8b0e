// Mailchimp audience export → SES contact list import mapping.
// Pure functions only: no I/O. The converter streams rows through these.

import { InvalidOptionsError } from './errors';

// Columns a Mailchimp "Export Audience" CSV carries. Only "Email Address" is
// read today; the rest are accepted and ignored.
export const MAILCHIMP_COLUMNS = [
  'Email Address',
  'First Name',
  'Last Name',
  'Address',
  'Phone Number',
  'Birthday',
  'MEMBER_RATING',
  'OPTIN_TIME',
  'OPTIN_IP',
  'CONFIRM_TIME',
  'CONFIRM_IP',
  'LATITUDE',
  'LONGITUDE',
  'GMTOFF',
  'DSTOFF',
  'TIMEZONE',
  'CC',
  'REGION',
  'LAST_CHANGED',
  'LEID',
  'EUID',
  'NOTES',
  'TAGS',
] as const;

export type MailchimpColumn = (typeof MAILCHIMP_COLUMNS)[number];

export const MAILCHIMP_EMAIL_COLUMN: MailchimpColumn = 'Email Address';

// A parsed data line keyed by the header row. Unknown headers are allowed.
export type MailchimpContactRow = { [column: string]: string | undefined };

export type TopicPreference = 'opt_in' | 'opt_out';
export type SesTopicValue = 'OPT_IN' | 'OPT_OUT';

export type TopicPreferences = [topicName: string, preference: TopicPreference][];

// SES contact list CSV headers:
// - emailAddress
// - unsubscribeAll
// - attributesData
// - topicPreferences.<TOPIC_NAME> (one per topic)
export const SES_BASE_COLUMNS = ['emailAddress', 'unsubscribeAll', 'attributesData'] as const;
export const SES_TOPIC_COLUMN_PREFIX = 'topicPreferences.';

export const TOPIC_VALUES: Record<TopicPreference, SesTopicValue> = {
  opt_in: 'OPT_IN',
  opt_out: 'OPT_OUT',
};

export type SesContactRow = [
  emailAddress: string,
  unsubscribeAll: false,
  attributesData: null,
  ...topicPreferences: SesTopicValue[],
];

export interface SesContactSchema {
  /** Header row, in output order. */
  columns: string[];
  /** Static topic values appended to every row, aligned with the topic columns. */
  topicValues: SesTopicValue[];
}

export function topicColumn(topicName: string): string {
  return SES_TOPIC_COLUMN_PREFIX + topicName;
}

/**
 * Build the fixed output schema once per run. Topic names are used verbatim;
 * empty or repeated names are rejected rather than producing duplicate columns.
 */
export function buildSesContactSchema(topicPreferences: TopicPreferences = []): SesContactSchema {
  const issues: string[] = [];
  const seen = new Set<string>();
  topicPreferences.forEach(([name], i) => {
    if (name.length === 0) issues.push(`topicPreferences[${i}]: topic name must not be empty`);
    else if (seen.has(name)) issues.push(`topicPreferences[${i}]: duplicate topic "${name}"`);
    seen.add(name);
  });
  if (issues.length > 0) throw new InvalidOptionsError(issues);

  return {
    columns: [...SES_BASE_COLUMNS, ...topicPreferences.map(([name]) => topicColumn(name))],
    topicValues: topicPreferences.map(([, pref]) => TOPIC_VALUES[pref]),
  };
}

// A missing "Email Address" column maps to an empty string, never undefined.
export function mapContactToSesRow(contact: MailchimpContactRow, schema: SesContactSchema): SesContactRow {
  return [contact[MAILCHIMP_EMAIL_COLUMN] ?? '', false, null, ...schema.topicValues];
}
