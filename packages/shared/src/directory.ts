import type {
  Coordinate,
  DirectoryBuild,
  DirectoryPair,
  DirectoryRow,
  ParseResult,
  SkippedLine,
  SpotterDirectory,
} from './types.ts';
import { DIRECTORY_CSV_HEADER } from './constants.ts';
import { locatorToCoordinate, roundCoordinate, validateCoordinate } from './locator.ts';
import { decodeInput, formatCsvCell, normalizeCallsign, parseNumber, splitCsvLine, splitLines } from './text.ts';

function pairCoordinate(pair: DirectoryPair): { coordinate: Coordinate } | { reason: string } {
  if ('locator' in pair) {
    return locatorToCoordinate(pair.locator).match(
      (coordinate) => ({ coordinate }),
      (error) => ({ reason: error.message })
    );
  }
  return validateCoordinate(pair.coordinate).match(
    (coordinate) => ({ coordinate: roundCoordinate(coordinate) }),
    (error) => ({ reason: error.message })
  );
}

/**
 * Build a callsign -> coordinate snapshot. Later pairs replace earlier
 * ones for the same callsign; unconvertible pairs are reported, not fatal.
 */
export function buildSpotterDirectory(pairs: Iterable<DirectoryPair>): DirectoryBuild {
  const directory = new Map<string, Coordinate>();
  const skipped: SkippedLine[] = [];
  let position = 0;

  for (const pair of pairs) {
    position++;
    const callsign = normalizeCallsign(pair.callsign);
    const resolved = pairCoordinate(pair);

    if (!callsign) {
      skipped.push({ line: position, reason: 'missing callsign', raw: pair.callsign });
    } else if ('reason' in resolved) {
      skipped.push({ line: position, reason: resolved.reason, raw: pair.callsign });
    } else {
      directory.set(callsign, resolved.coordinate);
    }
  }

  return { directory, skipped };
}

/**
 * New snapshot with `fresh` laid over `existing`; neither input is touched.
 */
export function mergeSpotterDirectory(
  existing: SpotterDirectory,
  fresh: Iterable<DirectoryPair>
): DirectoryBuild {
  const previous = Array.from(existing, ([callsign, coordinate]): DirectoryPair => ({ callsign, coordinate }));
  return buildSpotterDirectory([...previous, ...fresh]);
}

export function resolveSpotter(directory: SpotterDirectory, callsign: string): Coordinate | null {
  return directory.get(normalizeCallsign(callsign)) ?? null;
}

export function directoryToRows(directory: SpotterDirectory): DirectoryRow[] {
  return Array.from(directory, ([callsign, { lat, lon }]) => ({
    callsign,
    latitude: lat,
    longitude: lon,
  }));
}

export function rowsToPairs(rows: DirectoryRow[]): DirectoryPair[] {
  return rows.map(({ callsign, latitude, longitude }) => ({
    callsign,
    coordinate: { lat: latitude, lon: longitude },
  }));
}

export function formatDirectoryCsv(rows: DirectoryRow[]): string {
  const lines = rows.map(
    ({ callsign, latitude, longitude }) => `${formatCsvCell(callsign)},${latitude},${longitude}`
  );
  return [DIRECTORY_CSV_HEADER.join(','), ...lines].join('\n') + '\n';
}

/**
 * Reads the persisted `callsign,latitude,longitude` table.
 */
export function parseDirectoryCsv(raw: string | Uint8Array): ParseResult<DirectoryRow> {
  const records: DirectoryRow[] = [];
  const skipped: SkippedLine[] = [];
  let header: string[] | null = null;

  splitLines(decodeInput(raw)).forEach((line, index) => {
    if (!line.trim()) return;

    const cells = splitCsvLine(line).map((cell) => cell.trim());
    if (!header) {
      header = cells.map((cell) => cell.toLowerCase());
      return;
    }

    const [callsign, latitude, longitude] = DIRECTORY_CSV_HEADER.map((column) => {
      const position = header?.indexOf(column) ?? -1;
      return position === -1 ? undefined : cells[position];
    });

    const lat = parseNumber(latitude);
    const lon = parseNumber(longitude);
    if (!callsign || lat === null || lon === null) {
      skipped.push({ line: index + 1, reason: 'row needs callsign, latitude and longitude', raw: line });
      return;
    }

    records.push({ callsign, latitude: lat, longitude: lon });
  });

  return { records, skipped };
}
