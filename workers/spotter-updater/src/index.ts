#!/usr/bin/env tsx
/**
 * Rebuilds the spotter directory CSV from a pasted RBN nodes table,
 * a saved copy of the nodes page, or an old "callsign lat lon" roster.
 * Entries already in the output file are kept unless the input has a
 * newer grid for the same callsign.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { Result, ok, err } from 'neverthrow';
import { loadConfig } from '@rbn-mapper/shared';
import {
  describeSkipped,
  detectRosterFormat,
  extractRoster,
  updateDirectory,
  type RosterFormat,
  type UpdaterError,
} from './utils.ts';

interface UpdateOptions {
  inputFile: string;
  output: string;
  format: RosterFormat | 'auto';
  merge: boolean;
}

interface UpdateSummary {
  parsed: number;
  written: number;
  previous: number;
  output: string;
}

const FORMATS = ['auto', 'tsv', 'html', 'coords'];

function isFormat(value: string): value is RosterFormat | 'auto' {
  return FORMATS.includes(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readText(path: string): Promise<Result<string, UpdaterError>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (error) {
    return err({
      type: 'READ_ERROR',
      message: `${path}: ${error instanceof Error ? error.message : 'Unknown read error'}`,
    });
  }
}

async function readExisting(path: string): Promise<Result<string | null, UpdaterError>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (error) {
    if (isMissingFile(error)) return ok(null);
    return err({
      type: 'READ_ERROR',
      message: `${path}: ${error instanceof Error ? error.message : 'Unknown read error'}`,
    });
  }
}

async function writeText(path: string, contents: string): Promise<Result<void, UpdaterError>> {
  try {
    await writeFile(path, contents, 'utf-8');
    return ok(undefined);
  } catch (error) {
    return err({
      type: 'WRITE_ERROR',
      message: `${path}: ${error instanceof Error ? error.message : 'Unknown write error'}`,
    });
  }
}

async function updateSpotters(options: UpdateOptions): Promise<Result<UpdateSummary, UpdaterError>> {
  const inputResult = await readText(options.inputFile);
  if (inputResult.isErr()) {
    return err(inputResult.error);
  }

  const text = inputResult.value;
  const format = options.format === 'auto' ? detectRosterFormat(text) : options.format;
  const roster = extractRoster(text, format);

  if (roster.skipped.length > 0) {
    console.warn(`[UPDATE] Skipped ${roster.skipped.length} input lines:`);
    describeSkipped(roster.skipped).forEach((line) => console.warn(line));
  }

  if (roster.pairs.length === 0) {
    return err({
      type: 'PARSE_ERROR',
      message:
        `No callsign/grid entries were parsed from ${options.inputFile} (${format}). ` +
        'If the nodes page layout changed, paste the nodes table into a text file and use that instead.',
    });
  }

  if (roster.stage) {
    console.log(`[UPDATE] Nodes page parsed from its ${roster.stage} stage`);
  }

  let existing: string | null = null;
  if (options.merge) {
    const existingResult = await readExisting(options.output);
    if (existingResult.isErr()) {
      return err(existingResult.error);
    }
    existing = existingResult.value;
  }

  const update = updateDirectory(existing, roster.pairs);
  if (update.skipped.length > 0) {
    console.warn(`[UPDATE] Dropped ${update.skipped.length} directory entries:`);
    describeSkipped(update.skipped).forEach((line) => console.warn(line));
  }

  const writeResult = await writeText(options.output, update.csv);
  if (writeResult.isErr()) {
    return err(writeResult.error);
  }

  return ok({
    parsed: roster.pairs.length,
    written: update.rows.length,
    previous: update.previousCount,
    output: options.output,
  });
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);

  const program: Command = new Command()
    .name('spotter-updater')
    .description('Update the spotter directory CSV from RBN nodes data')
    .requiredOption('-i, --input-file <path>', 'pasted nodes table, saved nodes page, or callsign/lat/lon roster')
    .option('-o, --output <path>', 'directory CSV to write', config.directoryFile)
    .option('-f, --format <format>', `input format: ${FORMATS.join(', ')}`, 'auto')
    .option('--no-merge', 'replace the output file instead of merging into it')
    .parse();

  const opts = program.opts<{ inputFile: string; output: string; format: string; merge: boolean }>();
  if (!isFormat(opts.format)) {
    program.error(`Unknown format "${opts.format}", expected one of ${FORMATS.join(', ')}`);
  }

  const result = await updateSpotters({ ...opts, format: opts.format });

  result.match(
    ({ parsed, written, previous, output }) => {
      console.log(`[UPDATE] Parsed ${parsed} entries`);
      console.log(`[UPDATE] Wrote ${written} unique spotters to ${output} (${previous} before)`);
    },
    (error) => {
      console.error(`[UPDATE] Failed: [${error.type}] ${error.message}`);
      process.exitCode = 1;
    }
  );
}

main().catch((error: unknown) => {
  console.error(`[UPDATE] Unexpected failure: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
