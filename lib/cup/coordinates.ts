import { FormatError } from './errors';

const MILLI_MINUTES_PER_DEGREE = 60_000;
const STRICT_PATTERN = /^(\d{2,3})(\d{2})\.(\d{3})([NSEW])$/;
const LOOSE_PATTERN = /^\d+(?:\.\d+)?[NSEW]$/i;

type Hemisphere = 'N' | 'S' | 'E' | 'W';

function isHemisphere(value: string): value is Hemisphere {
  return value === 'N' || value === 'S' || value === 'E' || value === 'W';
}

function degreeDigits(hemisphere: Hemisphere): number {
  return hemisphere === 'N' || hemisphere === 'S' ? 2 : 3;
}

function applyHemisphere(magnitude: number, hemisphere: Hemisphere): number {
  return hemisphere === 'S' || hemisphere === 'W' ? -magnitude : magnitude;
}

/**
 * Encode decimal degrees as a CUP coordinate, e.g. 52.765233 -> "5245.914N".
 * Minutes are rounded half-up to thousandths; a carry into 60 minutes rolls
 * over into the degrees.
 */
export function decimalToFixed(value: number, isLatitude: boolean): string {
  const magnitude = Math.abs(value);
  let degrees = Math.floor(magnitude);
  let milliMinutes = Math.round((magnitude - degrees) * MILLI_MINUTES_PER_DEGREE);
  if (milliMinutes >= MILLI_MINUTES_PER_DEGREE) {
    degrees += 1;
    milliMinutes -= MILLI_MINUTES_PER_DEGREE;
  }

  const wholeMinutes = Math.floor(milliMinutes / 1000);
  const fraction = milliMinutes % 1000;
  const hemisphere = isLatitude ? (value >= 0 ? 'N' : 'S') : value >= 0 ? 'E' : 'W';

  return (
    String(degrees).padStart(isLatitude ? 2 : 3, '0') +
    String(wholeMinutes).padStart(2, '0') +
    '.' +
    String(fraction).padStart(3, '0') +
    hemisphere
  );
}

// Accepted grammar:
//   strict: DDMM.mmm{N|S} or DDDMM.mmm{E|W} (three decimals, fixed offsets)
//   loose:  2 (N/S) or 3 (E/W) leading digits of degrees, the rest up to the
//           hemisphere letter is decimal minutes ("5245.91404N", "524591N")
export function fixedToDecimal(text: string): number {
  const trimmed = text.trim();
  const hemisphere = trimmed.slice(-1).toUpperCase();
  if (!isHemisphere(hemisphere)) {
    throw new FormatError(text, `Coordinate '${text}' must end with N, S, E or W`);
  }

  const digits = degreeDigits(hemisphere);
  const body = trimmed.slice(0, -1);
  const strict = (body + hemisphere).match(STRICT_PATTERN);
  if (strict && strict[1].length === digits) {
    const [, degrees, minutes, thousandths] = strict;
    const decimal =
      parseInt(degrees, 10) + (parseInt(minutes, 10) + parseInt(thousandths, 10) / 1000) / 60;
    return applyHemisphere(decimal, hemisphere);
  }

  const degreeRun = body.slice(0, digits);
  if (degreeRun.length !== digits || !/^\d+$/.test(degreeRun)) {
    throw new FormatError(text, `Coordinate '${text}' has no valid degree digits`);
  }
  const minuteRun = body.slice(digits);
  if (!/^\d*(?:\.\d+)?$/.test(minuteRun)) {
    throw new FormatError(text, `Coordinate '${text}' has invalid minutes '${minuteRun}'`);
  }

  const minutes = minuteRun ? parseFloat(minuteRun) : 0;
  return applyHemisphere(parseInt(degreeRun, 10) + minutes / 60, hemisphere);
}

export function isFixedCoordinate(text: string): boolean {
  return LOOSE_PATTERN.test(text.trim());
}
