import { Result, ok, err } from 'neverthrow';
import type { Coordinate, CoordinateError, LocatorError } from './types.ts';
import { COORDINATE_PRECISION, EARTH_RADIUS_KM } from './constants.ts';

// Field A-R, square 0-9, subsquare A-X, extended square 0-9
const LOCATOR_RE = /^[A-R]{2}[0-9]{2}(?:[A-X]{2}(?:[0-9]{2})?)?$/;

const LETTER_BASE = 'A'.charCodeAt(0);

export type LocatorLength = 4 | 6 | 8;

function invalid(input: string, message: string): LocatorError {
  return { type: 'INVALID_LOCATOR', message, input };
}

function letterIndex(locator: string, position: number): number {
  return locator.charCodeAt(position) - LETTER_BASE;
}

function digitAt(locator: string, position: number): number {
  return Number(locator.charAt(position));
}

export function roundCoordinate(coordinate: Coordinate): Coordinate {
  const factor = 10 ** COORDINATE_PRECISION;
  return {
    lat: Math.round(coordinate.lat * factor) / factor,
    lon: Math.round(coordinate.lon * factor) / factor,
  };
}

/**
 * Trim, uppercase and validate a Maidenhead locator.
 * Only complete pairs are accepted, so 5 and 7 character inputs fail.
 */
export function normalizeLocator(input: string): Result<string, LocatorError> {
  const locator = input.trim().toUpperCase();

  if (!locator) {
    return err(invalid(input, 'Locator is empty'));
  }

  if (locator.length !== 4 && locator.length !== 6 && locator.length !== 8) {
    return err(invalid(input, `Locator must be 4, 6 or 8 characters, got ${locator.length}`));
  }

  if (!LOCATOR_RE.test(locator)) {
    return err(invalid(input, `Locator "${input}" has a character outside its segment alphabet`));
  }

  return ok(locator);
}

export function isLocator(input: string): boolean {
  return normalizeLocator(input).isOk();
}

/**
 * Decode a locator to the centre of the cell it names, rounded to
 * COORDINATE_PRECISION decimal places.
 */
export function locatorToCoordinate(input: string): Result<Coordinate, LocatorError> {
  return normalizeLocator(input).map((locator) => {
    let lon = -180 + letterIndex(locator, 0) * 20;
    let lat = -90 + letterIndex(locator, 1) * 10;

    lon += digitAt(locator, 2) * 2;
    lat += digitAt(locator, 3);

    let lonSize = 2;
    let latSize = 1;

    if (locator.length >= 6) {
      lonSize /= 24;
      latSize /= 24;
      lon += letterIndex(locator, 4) * lonSize;
      lat += letterIndex(locator, 5) * latSize;
    }

    if (locator.length === 8) {
      lonSize /= 10;
      latSize /= 10;
      lon += digitAt(locator, 6) * lonSize;
      lat += digitAt(locator, 7) * latSize;
    }

    return roundCoordinate({ lat: lat + latSize / 2, lon: lon + lonSize / 2 });
  });
}

export function validateCoordinate(coordinate: Coordinate): Result<Coordinate, CoordinateError> {
  const { lat, lon } = coordinate;
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    return err({ type: 'INVALID_COORDINATE', message: `Latitude ${lat} is outside [-90, 90]` });
  }
  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    return err({ type: 'INVALID_COORDINATE', message: `Longitude ${lon} is outside [-180, 180]` });
  }
  return ok(coordinate);
}

// Index of the cell containing `offset`, clamped so the upper edge stays in the last cell
function cellIndex(offset: number, size: number, cells: number): number {
  return Math.min(Math.floor(offset / size), cells - 1);
}

/**
 * Encode a coordinate as the locator of the cell containing it.
 */
export function coordinateToLocator(
  coordinate: Coordinate,
  length: LocatorLength = 6
): Result<string, CoordinateError> {
  return validateCoordinate(coordinate).map(({ lat, lon }) => {
    let lonRest = lon + 180;
    let latRest = lat + 90;

    const fieldLon = cellIndex(lonRest, 20, 18);
    const fieldLat = cellIndex(latRest, 10, 18);
    lonRest -= fieldLon * 20;
    latRest -= fieldLat * 10;

    const squareLon = cellIndex(lonRest, 2, 10);
    const squareLat = cellIndex(latRest, 1, 10);
    lonRest -= squareLon * 2;
    latRest -= squareLat;

    let locator =
      String.fromCharCode(LETTER_BASE + fieldLon, LETTER_BASE + fieldLat) +
      `${squareLon}${squareLat}`;

    if (length >= 6) {
      const subLon = cellIndex(lonRest, 2 / 24, 24);
      const subLat = cellIndex(latRest, 1 / 24, 24);
      lonRest -= subLon * (2 / 24);
      latRest -= subLat * (1 / 24);
      locator += String.fromCharCode(LETTER_BASE + subLon, LETTER_BASE + subLat);
    }

    if (length === 8) {
      const extLon = cellIndex(lonRest, 2 / 240, 10);
      const extLat = cellIndex(latRest, 1 / 240, 10);
      locator += `${extLon}${extLat}`;
    }

    return locator;
  });
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Haversine distance in kilometres
 */
export function greatCircleDistanceKm(from: Coordinate, to: Coordinate): number {
  const dLat = toRadians(to.lat - from.lat);
  const dLon = toRadians(to.lon - from.lon);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.lat)) *
      Math.cos(toRadians(to.lat)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}
