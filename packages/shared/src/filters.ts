import type { SpotFilter, SpotRecord } from './types.ts';
import { normalizeCallsign, parseTimeOfDay } from './text.ts';

function minutesOfDay(value: string): number | null {
  const time = parseTimeOfDay(value);
  return time ? time.hours * 60 + time.minutes : null;
}

// "HH:MM" part of a datetime timestamp
function recordMinutes(record: SpotRecord): number | null {
  if (record.tsPrecision !== 'datetime' || !record.ts) return null;
  return minutesOfDay(record.ts.slice(11, 16));
}

/**
 * Narrow a record set by dx, spotter, band and an inclusive UTC time window.
 * When a window is set, records without a time of day are dropped.
 */
export function filterSpots(records: readonly SpotRecord[], filter: SpotFilter): SpotRecord[] {
  const dx = filter.dx ? normalizeCallsign(filter.dx) : null;
  const spotter = filter.spotter ? normalizeCallsign(filter.spotter) : null;
  const band = filter.band && filter.band !== 'All' ? filter.band : null;
  const start = filter.startTime ? minutesOfDay(filter.startTime) : null;
  const end = filter.endTime ? minutesOfDay(filter.endTime) : null;
  const windowed = start !== null || end !== null;

  return records.filter((record) => {
    if (dx && record.dx !== dx) return false;
    if (spotter && record.spotter !== spotter) return false;
    if (band && record.band !== band) return false;
    if (!windowed) return true;

    const minutes = recordMinutes(record);
    if (minutes === null) return false;
    if (start !== null && minutes < start) return false;
    if (end !== null && minutes > end) return false;
    return true;
  });
}
