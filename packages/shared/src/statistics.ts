import type { BandData, Coordinate, SpotRecord, SpotStatistics, SpotterDirectory } from './types.ts';
import { BAND_ORDER } from './constants.ts';
import { isBandName } from './bands.ts';
import { greatCircleDistanceKm } from './locator.ts';
import { resolveSpotter } from './directory.ts';

function countBands(records: readonly SpotRecord[]): BandData[] {
  const counts = records.reduce<Map<string, number>>((acc, record) => {
    if (isBandName(record.band)) {
      acc.set(record.band, (acc.get(record.band) ?? 0) + 1);
    }
    return acc;
  }, new Map());

  return BAND_ORDER.flatMap((band) => {
    const count = counts.get(band);
    return count ? [{ band, count }] : [];
  });
}

/**
 * Summary statistics for a filtered record set.
 *
 * SNR figures ignore records without an SNR and are null when none has one.
 * Distances run from `reference` to each spotter found in `directory`;
 * spotters missing from it are listed in `unresolvedSpotters` and take no
 * part in `maxDistanceKm`.
 */
export function aggregateSpots(
  records: readonly SpotRecord[],
  reference: Coordinate,
  directory: SpotterDirectory
): SpotStatistics {
  const snrs = records.flatMap((record) => (record.snr === null ? [] : [record.snr]));

  const resolved = new Set<string>();
  const unresolved = new Set<string>();
  let maxDistanceKm: number | null = null;
  let farthestSpotter: string | null = null;

  records.forEach((record) => {
    const coordinate = resolveSpotter(directory, record.spotter);
    if (!coordinate) {
      unresolved.add(record.spotter);
      return;
    }
    resolved.add(record.spotter);

    const distance = greatCircleDistanceKm(reference, coordinate);
    if (maxDistanceKm === null || distance > maxDistanceKm) {
      maxDistanceKm = distance;
      farthestSpotter = record.spotter;
    }
  });

  return {
    count: records.length,
    averageSnr: snrs.length > 0 ? snrs.reduce((sum, snr) => sum + snr, 0) / snrs.length : null,
    maxSnr: snrs.reduce<number | null>((max, snr) => (max === null || snr > max ? snr : max), null),
    bandCounts: countBands(records),
    maxDistanceKm,
    farthestSpotter,
    resolvedSpotters: resolved.size,
    unresolvedSpotters: Array.from(unresolved),
  };
}
