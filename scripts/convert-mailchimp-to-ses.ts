#!/usr/bin/env node
/*
  Convert a Mailchimp audience export into an AWS SES contact list import CSV.

  Usage:
    npm run convert -- members_export.csv ses_contacts.csv --topic "Weekly Digest=opt_in" --topic "Promotions=opt_out"

  Set DIAG_CONVERT=1 (in the environment or .env.local) for [Diag] logging.
*/

import { convertMailchimpToSes } from '../lib/ses/converter';
import { ConvertCommand, parseConvertArgs, USAGE } from '../lib/ses/cliArgs';
import { ConversionError } from '../lib/ses/errors';
import { loadEnvFile } from '../lib/utils/envFile';

async function main(): Promise<number> {
  loadEnvFile('.env.local');

  let command: ConvertCommand;
  try {
    command = parseConvertArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof ConversionError)) throw err;
    console.error(`[convert] ${err.code}: ${err.message}`);
    console.error(USAGE);
    return 1;
  }
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const result = await convertMailchimpToSes(command.inputPath, command.outputPath, command.options);
  if (!result.success) {
    console.error(`[convert] ${result.error.code}: ${result.error.message}`);
    return 1;
  }
  const skipped = result.rowsSkipped > 0 ? ` (skipped ${result.rowsSkipped} malformed rows)` : '';
  console.log(`Wrote ${result.rowsWritten} contacts to ${result.outputPath}${skipped}`);
  return 0;
}

main()
  .then((code) => { process.exitCode = code; })
  .catch((err) => { console.error(err); process.exit(1); });
