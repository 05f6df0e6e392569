import type { BAND_TABLE, UNKNOWN_BAND } from './constants.ts';

export type BandName = (typeof BAND_TABLE)[number]['band'];
export type BandClass = BandName | typeof UNKNOWN_BAND;

export interface Coordinate {
  lat: number;
  lon: number;
}

export type SpotSource = 'pasted' | 'csv' | 'html';
export type TimestampPrecision = 'datetime' | 'date';

export interface SpotRecord {
  readonly spotter: string;
  readonly dx: string;
  readonly freq: number | null;
  readonly band: BandClass;
  readonly mode: string;
  readonly spotType: string | null;
  readonly snr: number | null;
  readonly speed: number | null;
  readonly distanceKm: number | null;
  readonly ts: string | null;
  readonly tsPrecision: TimestampPrecision | null;
  readonly seen: string | null;
  readonly source: SpotSource;
}

export interface SkippedLine {
  line: number;
  reason: string;
  raw: string;
}

export interface ParseResult<T> {
  records: T[];
  skipped: SkippedLine[];
}

export type HtmlStage = 'table' | 'text' | 'pattern';

export interface HtmlParseResult<T> extends ParseResult<T> {
  // null when no stage produced anything
  stage: HtmlStage | null;
}

export interface SourceAdapter<T, R extends ParseResult<T> = ParseResult<T>> {
  readonly name: string;
  parse(raw: string | Uint8Array): R;
}

export interface RosterEntry {
  callsign: string;
  locator: string;
}

export interface DirectoryRow {
  callsign: string;
  latitude: number;
  longitude: number;
}

export type DirectoryPair =
  | { callsign: string; locator: string }
  | { callsign: string; coordinate: Coordinate };

export type SpotterDirectory = ReadonlyMap<string, Coordinate>;

export interface DirectoryBuild {
  directory: SpotterDirectory;
  skipped: SkippedLine[];
}

export type LocatorError = {
  type: 'INVALID_LOCATOR';
  message: string;
  input: string;
};

export type CoordinateError = {
  type: 'INVALID_COORDINATE';
  message: string;
};

export interface BandData {
  band: BandName;
  count: number;
}

export interface SpotStatistics {
  count: number;
  averageSnr: number | null;
  maxSnr: number | null;
  bandCounts: BandData[];
  maxDistanceKm: number | null;
  farthestSpotter: string | null;
  resolvedSpotters: number;
  unresolvedSpotters: string[];
}

export interface SpotFilter {
  dx?: string;
  spotter?: string;
  band?: BandClass | 'All';
  startTime?: string;
  endTime?: string;
}
