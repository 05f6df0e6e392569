/**
 * Spotter roster extraction
 *
 * Pulls (callsign, locator) pairs out of the RBN nodes listing, either
 * pasted as tab-separated text or saved as the nodes page HTML, plus the
 * older "callsign lat lon" roster format.
 */

import type { DirectoryRow, HtmlParseResult, ParseResult, RosterEntry, SkippedLine } from './types.ts';
import { flattenText, parseDocument, tableRows } from './html.ts';
import { normalizeLocator } from './locator.ts';
import { decodeInput, parseNumber, splitLines } from './text.ts';

// CALLSIGN<tab>anything<tab>LOCATOR<tab> anywhere in the raw document
const NODE_LINE_RE = /^([A-Z0-9/-]+)\t[^\n\t]*\t([A-Ra-r]{2}\d{2}(?:[A-Xa-x]{2})?(?:\d{2})?)\t/gm;

function rosterCallsign(raw: string): string {
  return raw.trim().replace(/\s+/g, '-');
}

/**
 * Tab-separated nodes table: callsign, bands, grid, dxcc, ...
 */
export function parseRosterText(text: string): ParseResult<RosterEntry> {
  const records: RosterEntry[] = [];
  const skipped: SkippedLine[] = [];

  splitLines(text).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.toLowerCase().startsWith('callsign')) return;

    const parts = line.split('\t');
    if (parts.length < 3) {
      skipped.push({ line: index + 1, reason: `expected at least 3 tab-separated cells, got ${parts.length}`, raw });
      return;
    }

    const callsign = rosterCallsign(parts[0] ?? '');
    const locator = normalizeLocator(parts[2] ?? '');
    if (!callsign || locator.isErr()) {
      skipped.push({
        line: index + 1,
        reason: locator.isErr() ? locator.error.message : 'missing callsign',
        raw,
      });
      return;
    }

    records.push({ callsign, locator: locator.value });
  });

  return { records, skipped };
}

/**
 * Legacy roster: whitespace separated "callsign latitude longitude"
 */
export function parseCoordinateRoster(raw: string | Uint8Array): ParseResult<DirectoryRow> {
  const records: DirectoryRow[] = [];
  const skipped: SkippedLine[] = [];

  splitLines(decodeInput(raw)).forEach((line, index) => {
    const parts = line.trim().split(/\s+/);
    const [callsign, latText, lonText] = parts;
    if (!callsign) return;

    if (parts.length < 3) {
      skipped.push({ line: index + 1, reason: `expected 3 fields, got ${parts.length}`, raw: line });
      return;
    }

    const latitude = parseNumber(latText);
    const longitude = parseNumber(lonText);
    if (latitude === null || longitude === null) {
      skipped.push({ line: index + 1, reason: 'latitude or longitude is not a number', raw: line });
      return;
    }

    records.push({ callsign, latitude, longitude });
  });

  return { records, skipped };
}

function parseNodeTable(rows: string[][]): ParseResult<RosterEntry> {
  const records: RosterEntry[] = [];
  const skipped: SkippedLine[] = [];

  rows.forEach((cells, index) => {
    if (cells.length < 3) return;
    const callsign = cells[0] ?? '';
    const locator = normalizeLocator(cells[2] ?? '');
    if (callsign && locator.isOk()) {
      records.push({ callsign, locator: locator.value });
    } else {
      skipped.push({ line: index + 1, reason: 'third cell is not a locator', raw: cells.join('\t') });
    }
  });

  return { records, skipped };
}

function matchNodeLines(html: string): RosterEntry[] {
  return Array.from(html.matchAll(NODE_LINE_RE)).flatMap((match) => {
    const [, callsign, locator] = match;
    return callsign && locator ? [{ callsign, locator: locator.toUpperCase() }] : [];
  });
}

/**
 * Nodes page HTML, tried in order: table rows, flattened page text,
 * then a line pattern over the raw markup. A later stage runs only when
 * the earlier ones found nothing; `stage` is null if none did.
 */
export function parseNodesHtml(raw: string | Uint8Array): HtmlParseResult<RosterEntry> {
  const html = decodeInput(raw);
  const root = parseDocument(html);

  const table = parseNodeTable(tableRows(root));
  if (table.records.length > 0) {
    return { ...table, stage: 'table' };
  }

  const text = parseRosterText(flattenText(root));
  if (text.records.length > 0) {
    return { ...text, stage: 'text' };
  }

  const matched = matchNodeLines(html);
  if (matched.length > 0) {
    return { records: matched, skipped: [], stage: 'pattern' };
  }

  return { records: [], skipped: [...table.skipped, ...text.skipped], stage: null };
}

export function looksLikeHtml(text: string): boolean {
  return /<\s*(?:!doctype|html|table|tr|body)\b/i.test(text);
}
