// Token and line helpers shared by the spot, roster and directory parsers

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const MEASURE_RE = /^([+-]?\d+(?:\.\d+)?)([a-z]*)$/i;
const TIME_RE = /^(\d{2}):?(\d{2})(?::(\d{2}))?z?$/i;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_RE = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?Z?)?$/;

export interface Measure {
  value: number | null;
  unit: string | null;
}

export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ParsedTimestamp {
  ts: string;
  precision: 'datetime' | 'date';
}

export function decodeInput(raw: string | Uint8Array): string {
  const text = typeof raw === 'string' ? raw : new TextDecoder('utf-8').decode(raw);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Uppercase, join embedded whitespace with '-' and drop the skimmer
 * marker RBN appends to spotter calls ("DK9IP-#" -> "DK9IP").
 */
export function normalizeCallsign(raw: string): string {
  return raw.trim().toUpperCase().replace(/\s+/g, '-').replace(/-#$/, '');
}

const CALLSIGN_RE = /^[A-Z0-9]+(?:[/-][A-Z0-9]+)*$/;

export function looksLikeCallsign(callsign: string): boolean {
  return CALLSIGN_RE.test(callsign) && /\d/.test(callsign) && /[A-Z]/.test(callsign);
}

// "18dB", "-3", "25" -> value plus any glued unit
export function parseMeasure(token: string): Measure {
  const match = MEASURE_RE.exec(token.trim());
  if (!match) return { value: null, unit: null };
  const value = Number(match[1]);
  return {
    value: Number.isFinite(value) ? value : null,
    unit: match[2] ? match[2].toLowerCase() : null,
  };
}

export function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw.trim());
  return Number.isFinite(value) ? value : null;
}

export function parseTimeOfDay(token: string): TimeOfDay | null {
  const match = TIME_RE.exec(token);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3] ?? '0');
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
}

export function parseIsoDate(value: string): CalendarDate | null {
  const match = DATE_RE.exec(value.trim());
  if (!match) return null;
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  if (date.month < 1 || date.month > 12 || date.day < 1 || date.day > daysInMonth(date.year, date.month)) {
    return null;
  }
  return date;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

// "Oct", "oct." or "October"; any other word is not a month
export function monthFromName(name: string): number | null {
  const word = name.toLowerCase().replace(/\.$/, '');
  const index = MONTHS.findIndex((month) => word === month || word === month.slice(0, 3));
  return index === -1 ? null : index + 1;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatDate({ year, month, day }: CalendarDate): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function formatDateTime(date: CalendarDate, time: TimeOfDay): string {
  return `${formatDate(date)}T${pad(time.hours)}:${pad(time.minutes)}:${pad(time.seconds)}Z`;
}

/**
 * Accepts "2024-03-15", "2024-03-15 00:00:01" and ISO strings with a Z.
 */
export function parseTimestamp(value: string): ParsedTimestamp | null {
  const match = TIMESTAMP_RE.exec(value.trim());
  if (!match || match[1] === undefined) return null;

  const date = parseIsoDate(match[1]);
  if (!date) return null;

  if (match[2] === undefined || match[3] === undefined) {
    return { ts: formatDate(date), precision: 'date' };
  }

  const time = parseTimeOfDay(`${match[2]}:${match[3]}${match[4] ? `:${match[4]}` : ''}`);
  if (!time) return null;
  return { ts: formatDateTime(date, time), precision: 'datetime' };
}

// Quote a cell when it holds a separator, a quote or a line break
export function formatCsvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Split one CSV line, honouring double-quoted fields and "" escapes.
 */
export function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (quoted) {
      if (char === '"' && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      cells.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  cells.push(current);
  return cells;
}
