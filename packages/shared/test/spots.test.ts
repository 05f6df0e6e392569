import test from 'ava';
import {
  createPastedTextAdapter,
  createHtmlSpotAdapter,
  csvAdapter,
  formatReferenceDate,
} from '../src/spots.ts';
import { filterSpots } from '../src/filters.ts';
import type { SpotRecord } from '../src/types.ts';

const pasted = createPastedTextAdapter({ referenceDate: '2024-10-19' });

const DL8LAS_SPOT: SpotRecord = {
  spotter: 'DL8LAS',
  dx: 'W1AW',
  freq: 14025,
  band: '20m',
  mode: 'CW',
  spotType: 'CQ',
  snr: 18,
  speed: 25,
  distanceKm: 6123,
  ts: '2024-10-19T14:32:00Z',
  tsPrecision: 'datetime',
  seen: null,
  source: 'pasted',
};

// Pasted text tests
test('pasted adapter returns one record and one skip for a short line', t => {
  const text = [
    'DL8LAS-#   W1AW   6123 km   14025.0   CW   CQ   18 dB   25 wpm   1432z 19 Oct',
    'DL8LAS W1AW 14025.0 CW',
  ].join('\n');

  const result = pasted.parse(text);

  t.deepEqual(result.records, [DL8LAS_SPOT]);
  t.deepEqual(result.skipped, [
    { line: 2, reason: 'expected at least 9 tokens, got 4', raw: 'DL8LAS W1AW 14025.0 CW' },
  ]);
});

test('pasted adapter ignores header and blank lines', t => {
  const text = [
    'spotter dx distance freq mode type snr speed time seen',
    '',
    '   ',
    'DL8LAS-# W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 19 Oct',
  ].join('\n');

  const result = pasted.parse(text);

  t.is(result.records.length, 1);
  t.deepEqual(result.skipped, []);
});

test('pasted adapter reads glued units and falls back to the reference date', t => {
  const result = pasted.parse('K1TTT W1AW 120km 7025.5 CW CQ -3dB 22wpm 0915Z');

  t.deepEqual(result.records, [{
    spotter: 'K1TTT',
    dx: 'W1AW',
    freq: 7025.5,
    band: '40m',
    mode: 'CW',
    spotType: 'CQ',
    snr: -3,
    speed: 22,
    distanceKm: 120,
    ts: '2024-10-19T09:15:00Z',
    tsPrecision: 'datetime',
    seen: null,
    source: 'pasted',
  }]);
});

test('pasted adapter converts miles to kilometres', t => {
  const result = pasted.parse('N4ZR W1AW 100 mi 3525.0 CW CQ 9 dB 20 wpm 0100z');
  const distance = result.records[0]?.distanceKm ?? 0;
  t.true(Math.abs(distance - 160.9344) < 1e-9);
});

test('pasted adapter keeps the seen annotation after the date', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 19 Oct 2 mins ago');
  t.is(result.records[0]?.seen, '2 mins ago');
  t.is(result.records[0]?.ts, '2024-10-19T14:32:00Z');
});

test('pasted adapter takes an explicit year from the date', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 3 Mar 2023');
  t.is(result.records[0]?.ts, '2023-03-03T14:32:00Z');
});

test('pasted adapter rolls dates after the reference day back a year', t => {
  const january = createPastedTextAdapter({ referenceDate: '2025-01-02' });
  const result = january.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 2359z 31 Dec');
  t.is(result.records[0]?.ts, '2024-12-31T23:59:00Z');
});

test('pasted adapter classifies an unreadable frequency as unknown', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14O25 CW CQ 18 dB 25 wpm 1432z');

  t.is(result.records.length, 1);
  t.is(result.records[0]?.freq, null);
  t.is(result.records[0]?.band, 'unknown');
});

test('pasted adapter skips lines with an unreadable time', t => {
  const line = 'DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm later';
  const result = pasted.parse(line);

  t.deepEqual(result.records, []);
  t.deepEqual(result.skipped, [{ line: 1, reason: 'unparseable time "later"', raw: line }]);
});

test('pasted adapter skips prose that does not start with callsigns', t => {
  const result = pasted.parse('this is a long line of prose with many words in it');

  t.is(result.records.length, 0);
  t.is(result.skipped[0]?.reason, 'spotter or dx is not a callsign');
});

test('pasted adapter leaves the timestamp empty without a usable reference date', t => {
  const undated = createPastedTextAdapter({ referenceDate: 'yesterday' });
  const result = undated.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z');

  t.is(result.records[0]?.ts, null);
  t.is(result.records[0]?.tsPrecision, null);
});

test('pasted adapter reads the two-word beacon spot type', t => {
  const result = pasted.parse('DL8LAS 4U1UN 6123 km 14100.0 CW NCDXF B 18 dB 22 wpm 1432z 19 Oct');

  t.deepEqual(result.skipped, []);
  t.deepEqual(result.records, [{
    spotter: 'DL8LAS',
    dx: '4U1UN',
    freq: 14100,
    band: '20m',
    mode: 'CW',
    spotType: 'NCDXF B',
    snr: 18,
    speed: 22,
    distanceKm: 6123,
    ts: '2024-10-19T14:32:00Z',
    tsPrecision: 'datetime',
    seen: null,
    source: 'pasted',
  }]);
});

test('pasted adapter reads a full month name', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 5 October');
  t.is(result.records[0]?.ts, '2024-10-05T14:32:00Z');
  t.is(result.records[0]?.seen, null);
});

test('pasted adapter leaves words that only start like a month in the seen text', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 3 Mayday');
  t.is(result.records[0]?.ts, '2024-10-19T14:32:00Z');
  t.is(result.records[0]?.seen, '3 Mayday');
});

test('pasted adapter does not take a day past the end of the month as a date', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 31 Feb');
  t.is(result.records[0]?.ts, '2024-10-19T14:32:00Z');
  t.is(result.records[0]?.seen, '31 Feb');
});

test('pasted adapter accepts a leap day', t => {
  const result = pasted.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z 29 Feb 2024');
  t.is(result.records[0]?.ts, '2024-02-29T14:32:00Z');
});

test('spots read against a compact reference date fall out of a time window', t => {
  const compact = createPastedTextAdapter({ referenceDate: '20241019' });
  const { records } = compact.parse('DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z');

  t.is(records[0]?.ts, null);
  t.deepEqual(filterSpots(records, { startTime: '14:00', endTime: '15:00' }), []);
});

// CSV tests
const ARCHIVE_CSV = [
  'callsign,de_pfx,de_cont,freq,band,dx,dx_pfx,dx_cont,mode,db,date,speed,tx_mode',
  'DK9IP,DL,EU,14025.1,20m,W1AW,K,NA,CW,18,2024-03-15 00:00:01,25,CQ',
  'KM3T-2,K,NA,7011.0,,W1AW,K,NA,CW,abc,2024-03-15 12:30:00,22,CQ',
  'VE2WU,VE,NA,3525,80m,W1AW,K,NA,CW,7,2024-03-15,20,BEACON',
  'W3LPL,K,NA,14030',
  'OH6BG,OH,EU,5357,60m,W1AW,K,NA,FT8,-12,2024-03-15 01:00:00,,CQ',
].join('\n');

test('csv adapter remaps archive columns to spot records', t => {
  const result = csvAdapter.parse(ARCHIVE_CSV);

  t.is(result.records.length, 4);
  t.deepEqual(result.records[0], {
    spotter: 'DK9IP',
    dx: 'W1AW',
    freq: 14025.1,
    band: '20m',
    mode: 'CW',
    spotType: 'CQ',
    snr: 18,
    speed: 25,
    distanceKm: null,
    ts: '2024-03-15T00:00:01Z',
    tsPrecision: 'datetime',
    seen: null,
    source: 'csv',
  });
});

test('csv adapter classifies a missing band and nulls bad numbers', t => {
  const record = csvAdapter.parse(ARCHIVE_CSV).records[1];

  t.is(record?.spotter, 'KM3T-2');
  t.is(record?.band, '40m');
  t.is(record?.snr, null);
  t.is(record?.ts, '2024-03-15T12:30:00Z');
});

test('csv adapter keeps date-only timestamps', t => {
  const record = csvAdapter.parse(ARCHIVE_CSV).records[2];

  t.is(record?.ts, '2024-03-15');
  t.is(record?.tsPrecision, 'date');
  t.is(record?.spotType, 'BEACON');
});

test('csv adapter reclassifies bands outside the table', t => {
  const record = csvAdapter.parse(ARCHIVE_CSV).records[3];

  t.is(record?.band, 'unknown');
  t.is(record?.snr, -12);
  t.is(record?.speed, null);
});

test('csv adapter skips rows with missing columns', t => {
  t.deepEqual(csvAdapter.parse(ARCHIVE_CSV).skipped, [
    { line: 5, reason: 'expected 13 columns, got 4', raw: 'W3LPL,K,NA,14030' },
  ]);
});

test('csv adapter reads a byte buffer with a byte order mark', t => {
  const bytes = new TextEncoder().encode(`\uFEFF${ARCHIVE_CSV}`);
  t.deepEqual(csvAdapter.parse(bytes), csvAdapter.parse(ARCHIVE_CSV));
});

test('csv adapter reports a header without spotter or dx columns', t => {
  const result = csvAdapter.parse('callsign,freq\nDK9IP,14025');

  t.deepEqual(result.records, []);
  t.deepEqual(result.skipped, [
    { line: 1, reason: 'header has no spotter or dx column', raw: 'callsign,freq' },
  ]);
});

test('csv adapter returns nothing for empty input', t => {
  t.deepEqual(csvAdapter.parse(''), { records: [], skipped: [] });
});

// HTML tests
const html = createHtmlSpotAdapter({ referenceDate: '2024-10-19' });

test('html adapter reads spot table rows', t => {
  const page = `
    <table>
      <tr><th>spotter</th><th>dx</th><th>distance</th><th>freq</th><th>mode</th><th>type</th><th>snr</th><th>speed</th><th>time</th></tr>
      <tr><td>DL8LAS-#</td><td>W1AW</td><td>6123 km</td><td>14025.0</td><td>CW</td><td>CQ</td><td>18 dB</td><td>25 wpm</td><td>1432z 19 Oct</td></tr>
    </table>`;

  const result = html.parse(page);

  t.is(result.stage, 'table');
  t.deepEqual(result.records, [{ ...DL8LAS_SPOT, source: 'html' }]);
});

test('html adapter falls back to the page text', t => {
  const page = '<html><body><pre>DL8LAS W1AW 6123 km 14025.0 CW CQ 18 dB 25 wpm 1432z</pre></body></html>';

  const result = html.parse(page);

  t.is(result.stage, 'text');
  t.is(result.records.length, 1);
  t.is(result.records[0]?.ts, '2024-10-19T14:32:00Z');
});

test('html adapter reports no stage when nothing matches', t => {
  const result = html.parse('<p>No spots right now</p>');

  t.is(result.stage, null);
  t.deepEqual(result.records, []);
});

test('formatReferenceDate formats the UTC day', t => {
  t.is(formatReferenceDate(new Date('2024-03-05T23:30:00Z')), '2024-03-05');
});
