import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { Readable, Writable } from 'stream';
import Papa from 'papaparse';
import {
  buildSesContactSchema,
  mapContactToSesRow,
  MailchimpContactRow,
  SesContactSchema,
} from './contactMapping';
import {
  ConversionError,
  InputNotFoundError,
  MalformedRowError,
  OutputWriteFailedError,
  toConversionError,
} from './errors';
import { ConversionOptionsInput, parseConversionOptions } from './options';
import { decodeUtf8 } from './utf8';
import { recordDiag } from '../utils/diag';

export type ConvertResult =
  | { success: true; outputPath: string; rowsWritten: number; rowsSkipped: number }
  | { success: false; error: ConversionError };

type CsvField = string | boolean | null;

type RowCounts = { rowsWritten: number; rowsSkipped: number };

type PipeContext = { inputFile: string; outputFile: string; skipMalformedRows: boolean };

export function formatCsvLine(fields: CsvField[]): string {
  return Papa.unparse([fields], { newline: '\n' }) + '\n';
}

/**
 * Maps papaparse cursors back to physical line numbers. Holds only the
 * decoded text papaparse has not consumed yet.
 */
class LineTracker {
  private pending = '';
  private pendingStart = 0;
  private line = 1;

  push(text: string): void {
    this.pending += text;
  }

  /** Line of the first non-blank character before `cursor`; consumes up to it. */
  consumeTo(cursor: number): number {
    const consumed = this.pending.slice(0, cursor - this.pendingStart);
    this.pending = this.pending.slice(consumed.length);
    this.pendingStart += consumed.length;

    const blankPrefix = consumed.match(/^[\r\n]*/)?.[0] ?? '';
    const start = this.line + countLineBreaks(blankPrefix);
    this.line += countLineBreaks(consumed);
    return start;
  }
}

const countLineBreaks = (text: string): number => text.match(/\r\n|\r|\n/g)?.length ?? 0;

async function* trackLines(texts: AsyncIterable<string>, lines: LineTracker): AsyncGenerator<string> {
  for await (const text of texts) {
    lines.push(text);
    yield text;
  }
}

function fieldCountError(expected: number, parsed: number): string | undefined {
  if (parsed < expected) return `Too few fields: expected ${expected} fields but parsed ${parsed}`;
  if (parsed > expected) return `Too many fields: expected ${expected} fields but parsed ${parsed}`;
  return undefined;
}

// Duplicate columns keep their first value.
function toContact(header: string[], fields: string[]): MailchimpContactRow {
  const contact: MailchimpContactRow = {};
  header.forEach((column, i) => {
    if (contact[column] === undefined) contact[column] = fields[i];
  });
  return contact;
}

function pipeContacts(
  source: Readable,
  lines: LineTracker,
  sink: Writable,
  schema: SesContactSchema,
  ctx: PipeContext
): Promise<RowCounts> {
  return new Promise((resolve, reject) => {
    const counts: RowCounts = { rowsWritten: 0, rowsSkipped: 0 };
    let header: string[] | undefined;
    let record = 0;
    let settled = false;
    let parser: Papa.Parser | undefined;

    const fail = (err: ConversionError) => {
      if (settled) return;
      settled = true;
      parser?.abort();
      source.destroy();
      reject(err);
    };

    // Backpressure: stop reading while the output buffer drains.
    const write = (fields: CsvField[]) => {
      if (!sink.write(formatCsvLine(fields))) source.pause();
    };

    sink.on('error', (err) => fail(new OutputWriteFailedError(ctx.outputFile, err)));
    sink.on('drain', () => source.resume());

    write(schema.columns);

    // header: false so the header row goes through step and gets checked too.
    Papa.parse<string[]>(source, {
      header: false,
      delimiter: ',',
      skipEmptyLines: true,
      dynamicTyping: false,
      step: (results, handle) => {
        parser = handle;
        if (settled) return;
        const line = lines.consumeTo(results.meta.cursor);
        const problems = results.errors.map((e) => e.message);

        if (header === undefined) {
          if (problems.length > 0) fail(new MalformedRowError(0, line, problems.join('; ')));
          else header = results.data;
          return;
        }

        record += 1;
        const countProblem = fieldCountError(header.length, results.data.length);
        if (countProblem) problems.push(countProblem);
        if (problems.length > 0) {
          const err = new MalformedRowError(record, line, problems.join('; '));
          if (!ctx.skipMalformedRows) {
            fail(err);
            return;
          }
          counts.rowsSkipped += 1;
          recordDiag('converter', 'skipped malformed row', { row: err.row, line: err.line, reason: err.reason });
          return;
        }
        write(mapContactToSesRow(toContact(header, results.data), schema));
        counts.rowsWritten += 1;
      },
      complete: () => {
        if (settled) return;
        sink.once('finish', () => {
          if (settled) return;
          settled = true;
          resolve(counts);
        });
        sink.end();
      },
      error: (err) => fail(toConversionError(err, (cause) => new InputNotFoundError(ctx.inputFile, cause))),
    });
  });
}

async function closeHandles(input: FileHandle, output: FileHandle, ctx: PipeContext): Promise<ConversionError | undefined> {
  const [inputClosed, outputClosed] = await Promise.allSettled([input.close(), output.close()]);
  if (outputClosed.status === 'rejected') return new OutputWriteFailedError(ctx.outputFile, outputClosed.reason);
  if (inputClosed.status === 'rejected') return new InputNotFoundError(ctx.inputFile, inputClosed.reason);
  return undefined;
}

/**
 * Convert a Mailchimp audience export into an SES contact list import CSV.
 *
 * Single pass: rows are decoded, mapped and written as they arrive, so memory
 * does not grow with the file. Resolves with `success: false` for every
 * ConversionError; a partially written output file may remain in that case.
 */
export async function convertMailchimpToSes(
  inputPath: string,
  outputPath: string,
  options: ConversionOptionsInput = {}
): Promise<ConvertResult> {
  try {
    const { topicPreferences, skipMalformedRows } = parseConversionOptions(options);
    const schema = buildSesContactSchema(topicPreferences);
    const ctx: PipeContext = {
      inputFile: path.resolve(inputPath),
      outputFile: path.resolve(outputPath),
      skipMalformedRows,
    };
    recordDiag('converter', 'start', { ...ctx, columns: schema.columns });

    const input = await fs.promises.open(ctx.inputFile, 'r').catch((cause: unknown) => {
      throw new InputNotFoundError(ctx.inputFile, cause);
    });
    const output = await fs.promises.open(ctx.outputFile, 'w').catch(async (cause: unknown) => {
      await input.close();
      throw new OutputWriteFailedError(ctx.outputFile, cause);
    });

    const lines = new LineTracker();
    const source = Readable.from(trackLines(decodeUtf8(input.createReadStream({ autoClose: false })), lines));
    const sink = output.createWriteStream({ autoClose: false, encoding: 'utf8' });

    let counts: RowCounts = { rowsWritten: 0, rowsSkipped: 0 };
    let failure: ConversionError | undefined;
    try {
      counts = await pipeContacts(source, lines, sink, schema, ctx);
    } catch (err) {
      failure = toConversionError(err, (cause) => new OutputWriteFailedError(ctx.outputFile, cause));
    }
    source.destroy();
    sink.destroy();
    const closeFailure = await closeHandles(input, output, ctx);

    const error = failure ?? closeFailure;
    if (error) throw error;
    recordDiag('converter', 'finished', { outputFile: ctx.outputFile, ...counts });
    return { success: true, outputPath: ctx.outputFile, ...counts };
  } catch (err) {
    if (err instanceof ConversionError) {
      recordDiag('converter', 'failed', { code: err.code, message: err.message });
      return { success: false, error: err };
    }
    throw err;
  }
}
