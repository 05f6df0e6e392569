import type { BandClass, BandName } from './types.ts';
import { BAND_TABLE, UNKNOWN_BAND } from './constants.ts';

// Frequencies are in kHz (e.g., 14025 for 14.025 MHz)
export function classifyBand(freqKhz: number | null): BandClass {
  if (freqKhz === null || !Number.isFinite(freqKhz)) return UNKNOWN_BAND;
  const range = BAND_TABLE.find(({ low, high }) => freqKhz >= low && freqKhz <= high);
  return range?.band ?? UNKNOWN_BAND;
}

export function isBandName(value: string): value is BandName {
  return BAND_TABLE.some((range) => range.band === value);
}
