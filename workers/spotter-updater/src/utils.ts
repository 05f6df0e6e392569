// Utility functions extracted for testing

import {
  buildSpotterDirectory,
  directoryToRows,
  formatDirectoryCsv,
  looksLikeHtml,
  mergeSpotterDirectory,
  parseCoordinateRoster,
  parseDirectoryCsv,
  parseNodesHtml,
  parseRosterText,
  rowsToPairs,
  type DirectoryPair,
  type DirectoryRow,
  type HtmlStage,
  type SkippedLine,
} from '@rbn-mapper/shared';

export type RosterFormat = 'tsv' | 'html' | 'coords';

export type UpdaterError =
  | { type: 'READ_ERROR'; message: string }
  | { type: 'PARSE_ERROR'; message: string }
  | { type: 'WRITE_ERROR'; message: string };

export interface ExtractedRoster {
  format: RosterFormat;
  pairs: DirectoryPair[];
  skipped: SkippedLine[];
  stage: HtmlStage | null;
}

export interface DirectoryUpdate {
  csv: string;
  rows: DirectoryRow[];
  previousCount: number;
  skipped: SkippedLine[];
}

// Saved nodes page, pasted nodes table, or the old "callsign lat lon" roster
export function detectRosterFormat(text: string): RosterFormat {
  if (looksLikeHtml(text)) return 'html';
  if (text.includes('\t')) return 'tsv';
  return 'coords';
}

export function extractRoster(text: string, format: RosterFormat): ExtractedRoster {
  switch (format) {
    case 'html': {
      const { records, skipped, stage } = parseNodesHtml(text);
      return { format, pairs: records, skipped, stage };
    }
    case 'tsv': {
      const { records, skipped } = parseRosterText(text);
      return { format, pairs: records, skipped, stage: null };
    }
    case 'coords': {
      const { records, skipped } = parseCoordinateRoster(text);
      return { format, pairs: rowsToPairs(records), skipped, stage: null };
    }
  }
}

/**
 * Lay freshly extracted pairs over the persisted directory (if any) and
 * render the new file contents.
 */
export function updateDirectory(existingCsv: string | null, pairs: DirectoryPair[]): DirectoryUpdate {
  const existing = existingCsv === null ? { records: [], skipped: [] } : parseDirectoryCsv(existingCsv);
  const previous = buildSpotterDirectory(rowsToPairs(existing.records));
  const merged = mergeSpotterDirectory(previous.directory, pairs);
  const rows = directoryToRows(merged.directory);

  return {
    csv: formatDirectoryCsv(rows),
    rows,
    previousCount: previous.directory.size,
    skipped: [...existing.skipped, ...previous.skipped, ...merged.skipped],
  };
}

export function describeSkipped(skipped: SkippedLine[], limit = 5): string[] {
  const lines = skipped.slice(0, limit).map(({ line, reason }) => `  line ${line}: ${reason}`);
  if (skipped.length > limit) {
    lines.push(`  ... and ${skipped.length - limit} more`);
  }
  return lines;
}
