// Amateur bands in kHz, ascending. Bounds are inclusive.
export const BAND_TABLE = [
  { low: 1800, high: 2000, band: '160m' },
  { low: 3500, high: 4000, band: '80m' },
  { low: 7000, high: 7300, band: '40m' },
  { low: 10100, high: 10150, band: '30m' },
  { low: 14000, high: 14350, band: '20m' },
  { low: 18068, high: 18168, band: '17m' },
  { low: 21000, high: 21450, band: '15m' },
  { low: 24890, high: 24990, band: '12m' },
  { low: 28000, high: 29700, band: '10m' },
  { low: 50000, high: 54000, band: '6m' },
] as const;

export const BAND_ORDER = BAND_TABLE.map((range) => range.band);

export const UNKNOWN_BAND = 'unknown' as const;

// Decimal places kept on every coordinate (~100 m at the equator)
export const COORDINATE_PRECISION = 3;

export const EARTH_RADIUS_KM = 6371;

export const KM_PER_MILE = 1.609344;

export const DEFAULT_GRID_SQUARE = 'FN31pr';

export const DEFAULT_DIRECTORY_FILE = 'spotter_coords.csv';

export const DIRECTORY_CSV_HEADER = ['callsign', 'latitude', 'longitude'] as const;
