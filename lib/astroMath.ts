// Angle utilities shared by the geodesy and catalog modules

export type AngleFormat = 'r' | 'd' | 's';

export function radians(degrees: number): number {
  return degrees * Math.PI / 180;
}

export function degrees(radians: number): number {
  return radians * 180 / Math.PI;
}

export function hoursToRadians(hours: number): number {
  return radians(hours * 15);
}

export interface SexagesimalParts {
  sign: '+' | '-';
  degrees: number;
  minutes: number;
  seconds: number;
  fraction: number; // integer, `ndp` digits
}

/**
 * Split an angle in radians into degrees, arcminutes, arcseconds and a
 * fraction of an arcsecond rounded to `ndp` decimal places.
 */
export function radiansToDms(rad: number, ndp = 2): SexagesimalParts {
  const scale = 10 ** ndp;
  const units = Math.round(Math.abs(degrees(rad)) * 3600 * scale);

  const fraction = units % scale;
  const totalSeconds = Math.floor(units / scale);
  const seconds = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);

  return {
    sign: rad < 0 ? '-' : '+',
    degrees: Math.floor(totalMinutes / 60),
    minutes: totalMinutes % 60,
    seconds,
    fraction,
  };
}

// "-155 28 37.20": no sign for positive angles, no padding on d/m/s
export function formatSexagesimal(rad: number, separator = ' ', ndp = 2): string {
  const { sign, degrees: d, minutes, seconds, fraction } = radiansToDms(rad, ndp);
  const prefix = sign === '-' ? '-' : '';
  const whole = [d, minutes, seconds].join(separator);
  return ndp > 0 ? `${prefix}${whole}.${String(fraction).padStart(ndp, '0')}` : `${prefix}${whole}`;
}

/**
 * Parse "d m s" (space or colon separated, optional leading sign) into
 * decimal degrees. Returns undefined when the text is not sexagesimal.
 */
export function parseSexagesimal(text: string): number | undefined {
  const trimmed = text.trim();
  const match = /^([+-]?)(.*)$/.exec(trimmed);
  if (!match || !match[2]) return undefined;

  const fields = match[2].split(/[\s:]+/);
  if (fields.length > 3) return undefined;

  let total = 0;
  let divisor = 1;
  for (const field of fields) {
    if (!/^\d+(\.\d*)?$/.test(field)) return undefined;
    total += Number(field) / divisor;
    divisor *= 60;
  }

  return match[1] === '-' ? -total : total;
}

export function formatAngle(rad: number, format: 's', separator?: string): string;
export function formatAngle(rad: number, format?: 'r' | 'd', separator?: string): number;
export function formatAngle(rad: number, format?: AngleFormat, separator?: string): number | string;
export function formatAngle(rad: number, format: AngleFormat = 'r', separator = ' '): number | string {
  switch (format) {
    case 'd':
      return degrees(rad);
    case 's':
      return formatSexagesimal(rad, separator);
    default:
      return rad;
  }
}
