/**
 * Spot source adapters
 *
 * Each adapter turns one raw input (pasted spot list, RBN archive CSV,
 * saved HTML page) into normalized SpotRecords. Bad lines never throw:
 * they are returned in `skipped` with the reason.
 */

import type {
  HtmlParseResult,
  ParseResult,
  SkippedLine,
  SourceAdapter,
  SpotRecord,
  SpotSource,
} from './types.ts';
import { classifyBand, isBandName } from './bands.ts';
import { KM_PER_MILE } from './constants.ts';
import { flattenText, parseDocument, tableRows } from './html.ts';
import {
  daysInMonth,
  decodeInput,
  formatDate,
  formatDateTime,
  looksLikeCallsign,
  monthFromName,
  normalizeCallsign,
  parseIsoDate,
  parseMeasure,
  parseNumber,
  parseTimeOfDay,
  parseTimestamp,
  splitCsvLine,
  splitLines,
  type CalendarDate,
  type Measure,
} from './text.ts';

// ============================================================================
// Pasted text
// ============================================================================

// spotter dx distance freq mode type snr speed time, with every unit omitted
export const MIN_PASTED_TOKENS = 9;

const HEADER_WORDS = new Set(['spotter', 'de', 'callsign']);
const DISTANCE_UNITS = ['km', 'mi'];
const SNR_UNITS = ['db'];
const SPEED_UNITS = ['wpm', 'bps'];

export interface PastedTextOptions {
  // UTC day (YYYY-MM-DD) the list was captured; dates without a year resolve against it
  referenceDate: string;
}

type LineOutcome =
  | { kind: 'record'; record: SpotRecord }
  | { kind: 'skip'; reason: string }
  | { kind: 'ignore' };

class TokenCursor {
  private index = 0;

  constructor(private readonly tokens: string[]) {}

  peek(): string | undefined {
    return this.tokens[this.index];
  }

  next(): string | undefined {
    const token = this.tokens[this.index];
    if (token !== undefined) this.index++;
    return token;
  }

  // A number with an optional unit, glued ("18dB") or as the following token ("18 dB")
  measure(units: string[]): Measure | undefined {
    const token = this.next();
    if (token === undefined) return undefined;

    const measure = parseMeasure(token);
    const following = this.tokens[this.index]?.toLowerCase();
    if (measure.unit === null && following !== undefined && units.includes(following)) {
      this.index++;
      return { value: measure.value, unit: following };
    }
    return measure;
  }

  rest(): string[] {
    return this.tokens.slice(this.index);
  }
}

// Reads "19 Oct" or "19 Oct 2024" from the front of the remaining tokens
function readDayMonth(
  tokens: string[],
  reference: CalendarDate | null
): { date: CalendarDate; used: number } | null {
  const [dayToken, monthToken, yearToken] = tokens;
  if (dayToken === undefined || monthToken === undefined || !/^\d{1,2}$/.test(dayToken)) {
    return null;
  }
  const month = monthFromName(monthToken);
  const day = Number(dayToken);
  if (month === null) return null;

  let date: CalendarDate;
  let used: number;
  if (yearToken !== undefined && /^\d{4}$/.test(yearToken)) {
    date = { year: Number(yearToken), month, day };
    used = 3;
  } else if (reference) {
    // A day later in the year than the capture day belongs to the previous year
    const later = month > reference.month || (month === reference.month && day > reference.day);
    date = { year: later ? reference.year - 1 : reference.year, month, day };
    used = 2;
  } else {
    return null;
  }

  if (day < 1 || day > daysInMonth(date.year, month)) return null;
  return { date, used };
}

function toKilometres(distance: Measure): number | null {
  if (distance.value === null) return null;
  return distance.unit === 'mi' ? distance.value * KM_PER_MILE : distance.value;
}

export function parseSpotLine(
  line: string,
  reference: CalendarDate | null,
  source: SpotSource
): LineOutcome {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  const first = tokens[0];
  if (first === undefined) return { kind: 'ignore' };
  if (HEADER_WORDS.has(first.toLowerCase())) return { kind: 'ignore' };

  if (tokens.length < MIN_PASTED_TOKENS) {
    return { kind: 'skip', reason: `expected at least ${MIN_PASTED_TOKENS} tokens, got ${tokens.length}` };
  }

  const cursor = new TokenCursor(tokens);
  const spotter = normalizeCallsign(cursor.next() ?? '');
  const dx = normalizeCallsign(cursor.next() ?? '');
  if (!looksLikeCallsign(spotter) || !looksLikeCallsign(dx)) {
    return { kind: 'skip', reason: 'spotter or dx is not a callsign' };
  }

  const distance = cursor.measure(DISTANCE_UNITS);
  const freq = parseMeasure(cursor.next() ?? '').value;
  const mode = (cursor.next() ?? '').toUpperCase();
  let spotType = (cursor.next() ?? '').toUpperCase();
  // Beacon spots carry a two-word type
  if (spotType === 'NCDXF' && cursor.peek()?.toUpperCase() === 'B') {
    cursor.next();
    spotType = 'NCDXF B';
  }
  const snr = cursor.measure(SNR_UNITS);
  const speed = cursor.measure(SPEED_UNITS);

  const timeToken = cursor.next();
  const time = timeToken === undefined ? null : parseTimeOfDay(timeToken);
  if (!time) {
    return { kind: 'skip', reason: `unparseable time "${timeToken ?? ''}"` };
  }

  const rest = cursor.rest();
  const dayMonth = readDayMonth(rest, reference);
  const date = dayMonth?.date ?? reference;
  const seenTokens = dayMonth ? rest.slice(dayMonth.used) : rest;

  const record: SpotRecord = {
    spotter,
    dx,
    freq,
    band: classifyBand(freq),
    mode,
    spotType: spotType || null,
    snr: snr?.value ?? null,
    speed: speed?.value ?? null,
    distanceKm: distance ? toKilometres(distance) : null,
    ts: date ? formatDateTime(date, time) : null,
    tsPrecision: date ? 'datetime' : null,
    seen: seenTokens.length > 0 ? seenTokens.join(' ') : null,
    source,
  };

  return { kind: 'record', record };
}

function parseSpotLines(
  lines: string[],
  reference: CalendarDate | null,
  source: SpotSource
): ParseResult<SpotRecord> {
  const records: SpotRecord[] = [];
  const skipped: SkippedLine[] = [];

  lines.forEach((raw, index) => {
    const outcome = parseSpotLine(raw, reference, source);
    if (outcome.kind === 'record') {
      records.push(outcome.record);
    } else if (outcome.kind === 'skip') {
      skipped.push({ line: index + 1, reason: outcome.reason, raw });
    }
  });

  return { records, skipped };
}

export function createPastedTextAdapter(options: PastedTextOptions): SourceAdapter<SpotRecord> {
  const reference = parseIsoDate(options.referenceDate);
  return {
    name: 'pasted-text',
    parse: (raw) => parseSpotLines(splitLines(decodeInput(raw)), reference, 'pasted'),
  };
}

// ============================================================================
// CSV archive
// ============================================================================

type CanonicalColumn = 'spotter' | 'dx' | 'freq' | 'band' | 'mode' | 'snr' | 'speed' | 'ts' | 'spotType';

// RBN archives name the receiving station "callsign" and the SNR "db"
export const CSV_COLUMN_ALIASES: Record<string, CanonicalColumn> = {
  callsign: 'spotter',
  de: 'spotter',
  spotter: 'spotter',
  dx: 'dx',
  freq: 'freq',
  frequency: 'freq',
  band: 'band',
  mode: 'mode',
  db: 'snr',
  snr: 'snr',
  speed: 'speed',
  date: 'ts',
  time: 'ts',
  timestamp: 'ts',
  tx_mode: 'spotType',
  type: 'spotType',
};

function mapHeader(header: string[]): Map<CanonicalColumn, number> {
  const columns = new Map<CanonicalColumn, number>();
  header.forEach((name, index) => {
    const canonical = CSV_COLUMN_ALIASES[name.trim().toLowerCase()];
    if (canonical && !columns.has(canonical)) {
      columns.set(canonical, index);
    }
  });
  return columns;
}

export function parseSpotCsv(raw: string | Uint8Array): ParseResult<SpotRecord> {
  const lines = splitLines(decodeInput(raw));
  const headerIndex = lines.findIndex((line) => line.trim() !== '');
  const headerLine = lines[headerIndex];
  if (headerLine === undefined) {
    return { records: [], skipped: [] };
  }

  const header = splitCsvLine(headerLine);
  const columns = mapHeader(header);
  if (!columns.has('spotter') || !columns.has('dx')) {
    return {
      records: [],
      skipped: [{ line: headerIndex + 1, reason: 'header has no spotter or dx column', raw: headerLine }],
    };
  }

  const records: SpotRecord[] = [];
  const skipped: SkippedLine[] = [];

  lines.forEach((raw, index) => {
    if (index <= headerIndex || raw.trim() === '') return;

    const cells = splitCsvLine(raw);
    if (cells.length < header.length) {
      skipped.push({ line: index + 1, reason: `expected ${header.length} columns, got ${cells.length}`, raw });
      return;
    }

    const cell = (column: CanonicalColumn): string => {
      const position = columns.get(column);
      return position === undefined ? '' : (cells[position] ?? '').trim();
    };

    const spotter = normalizeCallsign(cell('spotter'));
    const dx = normalizeCallsign(cell('dx'));
    if (!spotter || !dx) {
      skipped.push({ line: index + 1, reason: 'missing spotter or dx', raw });
      return;
    }

    const freq = parseNumber(cell('freq'));
    const sourceBand = cell('band').toLowerCase();
    const timestamp = parseTimestamp(cell('ts'));

    records.push({
      spotter,
      dx,
      freq,
      band: isBandName(sourceBand) ? sourceBand : classifyBand(freq),
      mode: cell('mode').toUpperCase(),
      spotType: cell('spotType').toUpperCase() || null,
      snr: parseNumber(cell('snr')),
      speed: parseNumber(cell('speed')),
      distanceKm: null,
      ts: timestamp?.ts ?? null,
      tsPrecision: timestamp?.precision ?? null,
      seen: null,
      source: 'csv',
    });
  });

  return { records, skipped };
}

export const csvAdapter: SourceAdapter<SpotRecord> = {
  name: 'csv',
  parse: parseSpotCsv,
};

// ============================================================================
// HTML spot table
// ============================================================================

/**
 * Stage 1 reads <tr>/<td> rows as spot lines. Stage 2 runs only when stage 1
 * found nothing and re-reads the flattened page text as a pasted list.
 */
export function createHtmlSpotAdapter(
  options: PastedTextOptions
): SourceAdapter<SpotRecord, HtmlParseResult<SpotRecord>> {
  const reference = parseIsoDate(options.referenceDate);

  return {
    name: 'html',
    parse: (raw) => {
      const root = parseDocument(decodeInput(raw));

      const rowLines = tableRows(root).map((cells) => cells.join(' '));
      const table = parseSpotLines(rowLines, reference, 'html');
      if (table.records.length > 0) {
        return { ...table, stage: 'table' };
      }

      const text = parseSpotLines(splitLines(flattenText(root)), reference, 'html');
      if (text.records.length > 0) {
        return { ...text, stage: 'text' };
      }

      return { records: [], skipped: [...table.skipped, ...text.skipped], stage: null };
    },
  };
}

export function formatReferenceDate(date: Date): string {
  return formatDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}
