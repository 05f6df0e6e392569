#!/usr/bin/env tsx
/**
 * Reads a pasted RBN spot list, a saved spots page or an RBN archive CSV,
 * narrows it to one dx callsign and reports signal statistics measured
 * from the operator's grid square.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Command } from 'commander';
import { Result, ok, err } from 'neverthrow';
import {
  buildSpotterDirectory,
  formatReferenceDate,
  loadConfig,
  parseDirectoryCsv,
  rowsToPairs,
  type Coordinate,
  type SpotterDirectory,
} from '@rbn-mapper/shared';
import {
  buildReport,
  detectSpotFormat,
  formatReport,
  parseBandOption,
  parseReferenceDate,
  parseSpotInput,
  type ReportError,
  type SignalReport,
  type SpotFormat,
} from './utils.ts';

interface CliOptions {
  callsign: string;
  inputFile: string;
  format: string;
  grid?: string;
  band: string;
  start?: string;
  end?: string;
  directory: string;
  date?: string;
  json: boolean;
}

const FORMATS = ['auto', 'pasted', 'csv', 'html'];

function isSpotFormat(value: string): value is SpotFormat {
  return value === 'pasted' || value === 'csv' || value === 'html';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readText(path: string): Promise<Result<string, ReportError>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (error) {
    return err({
      type: 'READ_ERROR',
      message: `${path}: ${error instanceof Error ? error.message : 'Unknown read error'}`,
    });
  }
}

async function loadDirectory(path: string): Promise<Result<SpotterDirectory, ReportError>> {
  try {
    const text = await readFile(path, 'utf-8');
    const rows = parseDirectoryCsv(text);
    if (rows.skipped.length > 0) {
      console.warn(`[REPORT] Ignored ${rows.skipped.length} broken rows in ${path}`);
    }
    return ok(buildSpotterDirectory(rowsToPairs(rows.records)).directory);
  } catch (error) {
    if (isMissingFile(error)) {
      console.warn(`[REPORT] Directory ${path} not found, distances will be unavailable`);
      return ok(new Map<string, Coordinate>());
    }
    return err({
      type: 'READ_ERROR',
      message: `${path}: ${error instanceof Error ? error.message : 'Unknown read error'}`,
    });
  }
}

async function runReport(options: CliOptions, defaultGrid: string): Promise<Result<SignalReport, ReportError>> {
  const band = parseBandOption(options.band);
  if (band.isErr()) {
    return err(band.error);
  }

  if (options.format !== 'auto' && !isSpotFormat(options.format)) {
    return err({ type: 'INVALID_OPTION', message: `Unknown format "${options.format}", expected one of ${FORMATS.join(', ')}` });
  }

  const grid = options.grid?.trim() || defaultGrid;
  if (!options.grid?.trim()) {
    console.warn(`[REPORT] No grid square provided, using default: ${grid}`);
  }

  const inputResult = await readText(options.inputFile);
  if (inputResult.isErr()) {
    return err(inputResult.error);
  }

  const text = inputResult.value;
  const format = isSpotFormat(options.format) ? options.format : detectSpotFormat(basename(options.inputFile), text);
  const referenceDate = parseReferenceDate(options.date ?? formatReferenceDate(new Date()));
  if (referenceDate.isErr()) {
    return err(referenceDate.error);
  }
  const input = parseSpotInput(text, format, referenceDate.value);

  if (input.skipped.length > 0) {
    console.warn(`[REPORT] Skipped ${input.skipped.length} ${format} lines`);
  }
  if (format === 'html' && input.stage === null) {
    return err({ type: 'PARSE_ERROR', message: `No spots found in ${options.inputFile}` });
  }
  console.log(`[REPORT] Parsed ${input.records.length} spots from ${options.inputFile} (${format})`);

  const directoryResult = await loadDirectory(options.directory);
  if (directoryResult.isErr()) {
    return err(directoryResult.error);
  }

  return buildReport(input.records, directoryResult.value, {
    callsign: options.callsign,
    grid,
    band: band.value,
    startTime: options.start,
    endTime: options.end,
  });
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);

  const program: Command = new Command()
    .name('signal-report')
    .description('Summarize RBN spots for one callsign')
    .requiredOption('-c, --callsign <call>', 'dx callsign to report on')
    .requiredOption('-i, --input-file <path>', 'pasted spot list, saved spots page, or RBN archive CSV')
    .option('-f, --format <format>', `input format: ${FORMATS.join(', ')}`, 'auto')
    .option('-g, --grid <locator>', `reference grid square (default ${config.defaultGrid})`)
    .option('-b, --band <band>', 'band to keep, or All', 'All')
    .option('--start <HH:MM>', 'start of the UTC time window')
    .option('--end <HH:MM>', 'end of the UTC time window')
    .option('-d, --directory <path>', 'spotter directory CSV', config.directoryFile)
    .option('--date <YYYY-MM-DD>', 'UTC day the spot list was captured, YYYY-MM-DD or YYYYMMDD (default today)')
    .option('--json', 'print the report as JSON', false)
    .parse();

  const options = program.opts<CliOptions>();
  const result = await runReport(options, config.defaultGrid);

  result.match(
    (report) => {
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        formatReport(report).forEach((line) => console.log(line));
      }
    },
    (error) => {
      console.error(`[REPORT] Failed: [${error.type}] ${error.message}`);
      process.exitCode = 1;
    }
  );
}

main().catch((error: unknown) => {
  console.error(`[REPORT] Unexpected failure: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
