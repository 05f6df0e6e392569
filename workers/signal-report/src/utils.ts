// Utility functions extracted for testing

import { Result, ok, err } from 'neverthrow';
import {
  aggregateSpots,
  createHtmlSpotAdapter,
  createPastedTextAdapter,
  csvAdapter,
  filterSpots,
  isBandName,
  locatorToCoordinate,
  looksLikeHtml,
  normalizeCallsign,
  parseIsoDate,
  parseTimeOfDay,
  type BandClass,
  type Coordinate,
  type HtmlStage,
  type SkippedLine,
  type SpotRecord,
  type SpotStatistics,
  type SpotterDirectory,
} from '@rbn-mapper/shared';

export type SpotFormat = 'pasted' | 'csv' | 'html';

export type ReportError =
  | { type: 'READ_ERROR'; message: string }
  | { type: 'PARSE_ERROR'; message: string }
  | { type: 'INVALID_OPTION'; message: string };

export interface SpotInput {
  format: SpotFormat;
  records: SpotRecord[];
  skipped: SkippedLine[];
  stage: HtmlStage | null;
}

export interface ReportOptions {
  callsign: string;
  grid: string;
  band: BandClass | 'All';
  startTime?: string;
  endTime?: string;
}

export interface SignalReport {
  callsign: string;
  grid: string;
  reference: Coordinate;
  band: BandClass | 'All';
  window: { start: string; end: string } | null;
  totalRecords: number;
  statistics: SpotStatistics;
}

const DAY_START = '00:00';
const DAY_END = '23:59';

export function detectSpotFormat(fileName: string, text: string): SpotFormat {
  if (looksLikeHtml(text)) return 'html';
  if (fileName.toLowerCase().endsWith('.csv')) return 'csv';

  const firstLine = text.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';
  const columns = firstLine.toLowerCase().split(',').map((cell) => cell.trim());
  return columns.length > 1 && columns.includes('dx') ? 'csv' : 'pasted';
}

export function parseSpotInput(text: string, format: SpotFormat, referenceDate: string): SpotInput {
  switch (format) {
    case 'html':
      return { format, ...createHtmlSpotAdapter({ referenceDate }).parse(text) };
    case 'csv':
      return { format, ...csvAdapter.parse(text), stage: null };
    case 'pasted':
      return { format, ...createPastedTextAdapter({ referenceDate }).parse(text), stage: null };
  }
}

export function parseBandOption(value: string): Result<BandClass | 'All', ReportError> {
  if (value.toLowerCase() === 'all') return ok('All');
  const band = value.toLowerCase();
  if (isBandName(band)) return ok(band);
  if (band === 'unknown') return ok('unknown');
  return err({ type: 'INVALID_OPTION', message: `Unknown band "${value}"` });
}

/**
 * Capture day for date-less pasted spots, as YYYY-MM-DD or YYYYMMDD.
 * Returns the YYYY-MM-DD form.
 */
export function parseReferenceDate(value: string): Result<string, ReportError> {
  const trimmed = value.trim();
  const iso = /^\d{8}$/.test(trimmed)
    ? `${trimmed.slice(0, 4)}-${trimmed.slice(4, 6)}-${trimmed.slice(6, 8)}`
    : trimmed;
  if (parseIsoDate(iso)) return ok(iso);
  return err({ type: 'INVALID_OPTION', message: `Date "${value}" is not YYYY-MM-DD or YYYYMMDD` });
}

function checkTime(label: string, value: string | undefined): Result<string | undefined, ReportError> {
  if (value === undefined || parseTimeOfDay(value)) return ok(value);
  return err({ type: 'INVALID_OPTION', message: `${label} time "${value}" is not HH:MM` });
}

/**
 * Filter the parsed spots down to one dx callsign, band and time window,
 * then aggregate them against the reference grid.
 */
export function buildReport(
  records: SpotRecord[],
  directory: SpotterDirectory,
  options: ReportOptions
): Result<SignalReport, ReportError> {
  const callsign = normalizeCallsign(options.callsign);
  if (!callsign) {
    return err({ type: 'INVALID_OPTION', message: 'A dx callsign is required' });
  }

  const reference = locatorToCoordinate(options.grid);
  if (reference.isErr()) {
    return err({ type: 'INVALID_OPTION', message: reference.error.message });
  }

  const startTime = checkTime('Start', options.startTime);
  if (startTime.isErr()) {
    return err(startTime.error);
  }
  const endTime = checkTime('End', options.endTime);
  if (endTime.isErr()) {
    return err(endTime.error);
  }

  const window =
    startTime.value === undefined && endTime.value === undefined
      ? null
      : { start: startTime.value ?? DAY_START, end: endTime.value ?? DAY_END };

  const filtered = filterSpots(records, {
    dx: callsign,
    band: options.band,
    startTime: window?.start,
    endTime: window?.end,
  });

  return ok({
    callsign,
    grid: options.grid,
    reference: reference.value,
    band: options.band,
    window,
    totalRecords: records.length,
    statistics: aggregateSpots(filtered, reference.value, directory),
  });
}

export function formatReport(report: SignalReport): string[] {
  const { statistics: stats } = report;

  const snr =
    stats.averageSnr === null ? 'n/a' : `${stats.averageSnr.toFixed(1)} dB (max ${stats.maxSnr ?? 'n/a'} dB)`;
  const distance =
    stats.maxDistanceKm === null ? 'n/a' : `${Math.round(stats.maxDistanceKm)} km (${stats.farthestSpotter ?? '?'})`;
  const bands =
    stats.bandCounts.length > 0 ? stats.bandCounts.map(({ band, count }) => `${band}: ${count}`).join(', ') : 'none';
  const window = report.window ? `${report.window.start}-${report.window.end} UTC` : 'all day';

  return [
    `Signal report for ${report.callsign} from ${report.grid} (${report.reference.lat}, ${report.reference.lon})`,
    `Band: ${report.band}, window: ${window}`,
    `Spots: ${stats.count} of ${report.totalRecords}`,
    `Average SNR: ${snr}`,
    `Farthest spotter: ${distance}`,
    `Bands: ${bands}`,
    `Resolved spotters: ${stats.resolvedSpotters}, unresolved: ${stats.unresolvedSpotters.length}`,
  ];
}
