import type { Geocentric, Geodetic, Parallax } from './astroTypes';

// Oblate spheroid used for all conversions
export const EQU_RAD = 6378100;    // m
export const E = 0.996647186;      // 1 - flattening
export const EPS = 0.081819221;    // sqrt(1 - E^2)

const POLAR_RAD = EQU_RAD * E;
const E2 = 1 - E * E;              // EPS^2
const EP2 = (EQU_RAD * EQU_RAD - POLAR_RAD * POLAR_RAD) / (POLAR_RAD * POLAR_RAD);
// Axial distance, as a fraction of the geocentric distance, treated as on the pole
const POLE_TOLERANCE = 1e-12;

function isSet(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

/**
 * Geodetic latitude and height to geocentric latitude and distance.
 *
 * The sea-level point is located through its geocentric latitude
 * atan(E^2 tan(lat)); the height is then added along the local normal.
 */
export function geodeticToGeocentric(geod: Partial<Geodetic>): Geocentric | undefined {
  const { lat, alt } = geod;
  if (!isSet(lat) || !isSet(alt)) return undefined;

  const lambda = Math.atan2(E * E * Math.tan(lat), 1);
  const sinL = Math.sin(lambda);
  const seaLevel = Math.sqrt(EQU_RAD * EQU_RAD / (1 + (1 / (E * E) - 1) * sinL * sinL));

  const px = seaLevel * Math.cos(lambda) + alt * Math.cos(lat);
  const py = seaLevel * sinL + alt * Math.sin(lat);

  return {
    geocLat: Math.atan2(py, px),
    geocDist: Math.sqrt(px * px + py * py),
  };
}

/**
 * Geocentric latitude and distance back to geodetic latitude and height.
 *
 * Closed form (Heikkinen), evaluated for the northern hemisphere and
 * mirrored for southern latitudes. On the polar axis the height is
 * measured from the polar radius directly.
 */
export function geocentricToGeodetic(geoc: Partial<Geocentric>): Geodetic | undefined {
  const { geocLat, geocDist } = geoc;
  if (!isSet(geocLat) || !isSet(geocDist)) return undefined;

  const a = EQU_RAD;
  const b = POLAR_RAD;
  const p = geocDist * Math.cos(geocLat);
  const z = Math.abs(geocDist * Math.sin(geocLat));
  const sign = geocLat < 0 ? -1 : 1;

  if (Math.abs(p) <= POLE_TOLERANCE * Math.abs(geocDist)) {
    return { lat: sign * Math.PI / 2, alt: z - b };
  }

  const F = 54 * b * b * z * z;
  const G = p * p + (1 - E2) * z * z - E2 * (a * a - b * b);
  const c = E2 * E2 * F * p * p / (G * G * G);
  const s = Math.cbrt(1 + c + Math.sqrt(c * c + 2 * c));
  const k = s + 1 + 1 / s;
  const P = F / (3 * k * k * G * G);
  const Q = Math.sqrt(1 + 2 * E2 * E2 * P);
  const r0 = -(P * E2 * p) / (1 + Q)
    + Math.sqrt(Math.max(0, a * a / 2 * (1 + 1 / Q) - P * (1 - E2) * z * z / (Q * (1 + Q)) - P * p * p / 2));

  const dp = p - E2 * r0;
  const U = Math.sqrt(dp * dp + z * z);
  const V = Math.sqrt(dp * dp + (1 - E2) * z * z);
  const z0 = b * b * z / (a * V);

  const lat = Math.atan2(z + EP2 * z0, p);
  const alt = U * (1 - b * b / (a * V));
  if (!isSet(lat) || !isSet(alt)) return undefined;

  return { lat: sign * lat, alt };
}

export function geocentricToParallax(geoc: Partial<Geocentric>): Parallax | undefined {
  const { geocLat, geocDist } = geoc;
  if (!isSet(geocLat) || !isSet(geocDist)) return undefined;

  const rho = geocDist / EQU_RAD;
  return {
    C: rho * Math.sin(geocLat),
    S: rho * Math.cos(geocLat),
  };
}

export function parallaxToGeocentric(par: Partial<Parallax>): Geocentric | undefined {
  const { C, S } = par;
  if (!isSet(C) || !isSet(S)) return undefined;

  return {
    geocLat: Math.atan2(C, S),
    geocDist: Math.sqrt(S * S + C * C) * EQU_RAD,
  };
}
