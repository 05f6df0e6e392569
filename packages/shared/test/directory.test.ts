import test from 'ava';
import {
  buildSpotterDirectory,
  mergeSpotterDirectory,
  resolveSpotter,
  directoryToRows,
  rowsToPairs,
  formatDirectoryCsv,
  parseDirectoryCsv,
} from '../src/directory.ts';

// buildSpotterDirectory tests
test('buildSpotterDirectory keeps the last entry for a callsign', t => {
  const { directory, skipped } = buildSpotterDirectory([
    { callsign: 'W1AW', locator: 'FN31pr' },
    { callsign: 'W1AW', locator: 'FN20' },
  ]);

  t.is(directory.size, 1);
  t.deepEqual(directory.get('W1AW'), { lat: 40.5, lon: -75 });
  t.deepEqual(skipped, []);
});

test('buildSpotterDirectory skips entries that cannot be resolved', t => {
  const { directory, skipped } = buildSpotterDirectory([
    { callsign: 'K1TTT', locator: 'FN3' },
    { callsign: 'N1MM', coordinate: { lat: 95, lon: 0 } },
    { callsign: 'DL8LAS-#', coordinate: { lat: 52.6789, lon: 13.12345 } },
  ]);

  t.deepEqual(Array.from(directory.entries()), [['DL8LAS', { lat: 52.679, lon: 13.123 }]]);
  t.deepEqual(skipped.map(({ line, raw }) => ({ line, raw })), [
    { line: 1, raw: 'K1TTT' },
    { line: 2, raw: 'N1MM' },
  ]);
});

// mergeSpotterDirectory tests
test('mergeSpotterDirectory lets fresh entries win without touching the old snapshot', t => {
  const existing = buildSpotterDirectory([
    { callsign: 'W1AW', locator: 'FN31pr' },
    { callsign: 'K1TTT', locator: 'FN32ll' },
  ]).directory;

  const { directory } = mergeSpotterDirectory(existing, [
    { callsign: 'W1AW', locator: 'FN20' },
    { callsign: 'N4ZR', locator: 'FM19' },
  ]);

  t.deepEqual(Array.from(directory.keys()), ['W1AW', 'K1TTT', 'N4ZR']);
  t.deepEqual(directory.get('W1AW'), { lat: 40.5, lon: -75 });
  t.deepEqual(directory.get('K1TTT'), { lat: 42.479, lon: -73.042 });
  t.deepEqual(directory.get('N4ZR'), { lat: 39.5, lon: -77 });
  t.deepEqual(existing.get('W1AW'), { lat: 41.729, lon: -72.708 });
  t.not(directory, existing);
});

// resolveSpotter tests
test('resolveSpotter normalizes the callsign before lookup', t => {
  const { directory } = buildSpotterDirectory([{ callsign: 'DK9IP', locator: 'JN47' }]);

  t.deepEqual(resolveSpotter(directory, 'dk9ip-#'), { lat: 47.5, lon: 9 });
  t.is(resolveSpotter(directory, 'W1AW'), null);
});

// persisted format tests
test('formatDirectoryCsv writes the header and one row per callsign', t => {
  const { directory } = buildSpotterDirectory([
    { callsign: 'W1AW', locator: 'FN31pr' },
    { callsign: 'W1AW', locator: 'FN20' },
  ]);

  t.is(formatDirectoryCsv(directoryToRows(directory)), 'callsign,latitude,longitude\nW1AW,40.5,-75\n');
});

test('parseDirectoryCsv reads rows and reports broken ones', t => {
  const result = parseDirectoryCsv('callsign,latitude,longitude\nW1AW,41.729,-72.708\nBROKEN,,\n');

  t.deepEqual(result.records, [{ callsign: 'W1AW', latitude: 41.729, longitude: -72.708 }]);
  t.deepEqual(result.skipped, [{ line: 3, reason: 'row needs callsign, latitude and longitude', raw: 'BROKEN,,' }]);
});

test('parseDirectoryCsv follows the header column order', t => {
  const result = parseDirectoryCsv('longitude,callsign,latitude\n-72.708,W1AW,41.729\n');

  t.deepEqual(result.records, [{ callsign: 'W1AW', latitude: 41.729, longitude: -72.708 }]);
});

test('persisted rows rebuild the same directory', t => {
  const { directory } = buildSpotterDirectory([
    { callsign: 'W1AW', locator: 'FN31pr' },
    { callsign: 'K1TTT', locator: 'FN32ll' },
  ]);

  const csv = formatDirectoryCsv(directoryToRows(directory));
  const rebuilt = buildSpotterDirectory(rowsToPairs(parseDirectoryCsv(csv).records)).directory;

  t.deepEqual(Array.from(rebuilt.entries()), Array.from(directory.entries()));
});

test('formatDirectoryCsv quotes a callsign holding a comma so it reads back whole', t => {
  const rows = [{ callsign: 'W1AW,2', latitude: 40.5, longitude: -75 }];
  const csv = formatDirectoryCsv(rows);

  t.is(csv, 'callsign,latitude,longitude\n"W1AW,2",40.5,-75\n');
  t.deepEqual(parseDirectoryCsv(csv), { records: rows, skipped: [] });
});
