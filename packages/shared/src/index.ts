// Types
export type {
  BandName,
  BandClass,
  BandData,
  Coordinate,
  CoordinateError,
  DirectoryBuild,
  DirectoryPair,
  DirectoryRow,
  HtmlParseResult,
  HtmlStage,
  LocatorError,
  ParseResult,
  RosterEntry,
  SkippedLine,
  SourceAdapter,
  SpotFilter,
  SpotRecord,
  SpotSource,
  SpotStatistics,
  SpotterDirectory,
  TimestampPrecision,
} from './types.ts';

// Constants
export {
  BAND_TABLE,
  BAND_ORDER,
  UNKNOWN_BAND,
  COORDINATE_PRECISION,
  DEFAULT_GRID_SQUARE,
  DEFAULT_DIRECTORY_FILE,
} from './constants.ts';

// Grid locators
export {
  normalizeLocator,
  isLocator,
  locatorToCoordinate,
  coordinateToLocator,
  validateCoordinate,
  roundCoordinate,
  greatCircleDistanceKm,
} from './locator.ts';
export type { LocatorLength } from './locator.ts';

// Bands
export { classifyBand, isBandName } from './bands.ts';

// Spot ingestion
export {
  MIN_PASTED_TOKENS,
  CSV_COLUMN_ALIASES,
  createPastedTextAdapter,
  createHtmlSpotAdapter,
  csvAdapter,
  parseSpotCsv,
  formatReferenceDate,
} from './spots.ts';
export type { PastedTextOptions } from './spots.ts';
export { normalizeCallsign, parseIsoDate, parseTimeOfDay } from './text.ts';

// Roster and directory
export { parseRosterText, parseCoordinateRoster, parseNodesHtml, looksLikeHtml } from './roster.ts';
export {
  buildSpotterDirectory,
  mergeSpotterDirectory,
  resolveSpotter,
  directoryToRows,
  rowsToPairs,
  formatDirectoryCsv,
  parseDirectoryCsv,
} from './directory.ts';

// Filtering and statistics
export { filterSpots } from './filters.ts';
export { aggregateSpots } from './statistics.ts';

// Configuration
export { loadConfig } from './config.ts';
export type { MapperConfig } from './config.ts';
