import { z } from 'zod';
import { formatAngle, type AngleFormat } from './astroMath';
import type { LimitsSpec, NativeRepresentation, Parallax, TelescopeFields, TelescopeRecord } from './astroTypes';
import {
  geocentricToGeodetic,
  geocentricToParallax,
  geodeticToGeocentric,
  parallaxToGeocentric,
} from './geodesy';
import { checkLimits, copyLimits, defaultLimits } from './limits';
import { mpcCatalog, type MpcObservatory } from './mpc';
import { findObservatory, obsCodeFor, observatoryNames, type ObservatoryEntry } from './observatories';
import { getSettings } from './settings';

const ExplicitFieldsZ = z.object({
  name: z.string().min(1),
  fullName: z.string().optional(),
  obsCode: z.string().optional(),
  long: z.number().finite(),
  lat: z.number().finite().optional(),
  alt: z.number().finite().optional(),
  geocLat: z.number().finite().optional(),
  geocDist: z.number().finite().optional(),
  parallax: z.object({ C: z.number().finite().optional(), S: z.number().finite().optional() }).optional(),
});

type ExplicitFields = z.infer<typeof ExplicitFieldsZ>;

type TelescopeSource =
  | { kind: 'catalog'; name: string; entry: ObservatoryEntry }
  | { kind: 'mpc'; entry: MpcObservatory }
  | { kind: 'explicit'; fields: ExplicitFields };

type Coordinates = Pick<TelescopeRecord, 'lat' | 'alt' | 'geocLat' | 'geocDist' | 'parallax' | 'native'>;

export class UnknownTelescopeError extends Error {
  constructor(public readonly identifier: string) {
    super(`Unknown telescope: ${identifier}`);
    this.name = 'UnknownTelescopeError';
  }
}

function fromGeodetic(lat: number, alt: number): Coordinates | undefined {
  const geoc = geodeticToGeocentric({ lat, alt });
  const parallax = geoc && geocentricToParallax(geoc);
  if (!geoc || !parallax) return undefined;
  return { lat, alt, ...geoc, parallax, native: 'geodetic' };
}

function fromGeocentric(geocLat: number, geocDist: number, native: NativeRepresentation = 'geocentric'): Coordinates | undefined {
  const geod = geocentricToGeodetic({ geocLat, geocDist });
  const parallax = geocentricToParallax({ geocLat, geocDist });
  if (!geod || !parallax) return undefined;
  return { ...geod, geocLat, geocDist, parallax, native };
}

function fromParallax(parallax: Parallax): Coordinates | undefined {
  const geoc = parallaxToGeocentric(parallax);
  const coords = geoc && fromGeocentric(geoc.geocLat, geoc.geocDist, 'parallax');
  return coords && { ...coords, parallax: { ...parallax } };
}

function explicitCoordinates(fields: ExplicitFields): Coordinates | undefined {
  if (fields.lat !== undefined) {
    if (fields.alt === undefined) {
      console.warn(`[telescope] no altitude given for ${fields.name}, assuming 0 m`);
    }
    return fromGeodetic(fields.lat, fields.alt ?? 0);
  }
  if (fields.geocLat !== undefined && fields.geocDist !== undefined) {
    return fromGeocentric(fields.geocLat, fields.geocDist);
  }
  const { C, S } = fields.parallax ?? {};
  if (C !== undefined && S !== undefined) {
    return fromParallax({ C, S });
  }
  return undefined;
}

function buildRecord(source: TelescopeSource): TelescopeRecord | undefined {
  switch (source.kind) {
    case 'catalog': {
      const { entry } = source;
      const coords = fromGeodetic(entry.lat, entry.alt);
      if (!coords) return undefined;
      // catalog longitudes are west +ve
      return { name: source.name, fullName: entry.name, obsCode: obsCodeFor(source.name), long: -entry.west, ...coords };
    }
    case 'mpc': {
      const { entry } = source;
      const coords = fromParallax({ C: entry.parallaxC, S: entry.parallaxS });
      if (!coords) return undefined;
      return { name: entry.name, fullName: entry.name, obsCode: entry.code, long: entry.long, ...coords };
    }
    case 'explicit': {
      const { fields } = source;
      const coords = explicitCoordinates(fields);
      if (!coords) return undefined;
      const name = fields.name.toUpperCase();
      return { name, fullName: fields.fullName ?? fields.name, obsCode: fields.obsCode, long: fields.long, ...coords };
    }
  }
}

function lookupCode(code: string): TelescopeRecord | undefined {
  const entry = mpcCatalog().lookup(code.toUpperCase());
  return entry && buildRecord({ kind: 'mpc', entry });
}

function lookupIdentifier(identifier: string): TelescopeRecord | undefined {
  const name = identifier.toUpperCase();
  const entry = findObservatory(name);
  if (entry) return buildRecord({ kind: 'catalog', name, entry });
  return lookupCode(name);
}

function lookupFields(fields: TelescopeFields): TelescopeRecord | undefined {
  const parsed = ExplicitFieldsZ.safeParse(fields);
  return parsed.success ? buildRecord({ kind: 'explicit', fields: parsed.data }) : undefined;
}

/**
 * A telescope resolved from the observatory catalog, the MPC code table
 * or explicit coordinates. Positions are fixed once resolved; resolving
 * a different identity produces a new instance. Pointing limits start at
 * the catalog default and can be overridden per instance.
 *
 *   const tel = Telescope.fromName('JCMT');
 *   tel?.lat('s'); // "19 49 22.11"
 */
export class Telescope {
  private current: LimitsSpec;

  private constructor(private readonly record: TelescopeRecord) {
    this.current = defaultLimits(record.name);
  }

  /** Catalog mnemonic first, then MPC observatory code. */
  static fromName(name: string): Telescope | undefined {
    const record = lookupIdentifier(name);
    return record && new Telescope(record);
  }

  static fromCode(code: string): Telescope | undefined {
    const record = lookupCode(code);
    return record && new Telescope(record);
  }

  /**
   * Explicit coordinates. `name` and `long` are required, plus one of
   * `lat` (with `alt`), `geocLat` with `geocDist`, or `parallax` C and S,
   * taken in that order of preference.
   */
  static fromFields(fields: TelescopeFields): Telescope | undefined {
    const record = lookupFields(fields);
    return record && new Telescope(record);
  }

  static resolve(identifier: string | TelescopeFields): Telescope | undefined {
    return typeof identifier === 'string' ? Telescope.fromName(identifier) : Telescope.fromFields(identifier);
  }

  static require(identifier: string): Telescope {
    const tel = Telescope.fromName(identifier);
    if (!tel) throw new UnknownTelescopeError(identifier);
    return tel;
  }

  static telNames(): string[] {
    return observatoryNames();
  }

  static obsCodes(): string[] {
    return mpcCatalog().codes();
  }

  get name(): string {
    return this.record.name;
  }

  get fullName(): string {
    return this.record.fullName;
  }

  get obsCode(): string | undefined {
    return this.record.obsCode;
  }

  get native(): NativeRepresentation {
    return this.record.native;
  }

  /** Height above the ellipsoid, metres. */
  get alt(): number {
    return this.record.alt;
  }

  /** Distance from the Earth's centre, metres. */
  get geocDist(): number {
    return this.record.geocDist;
  }

  get parallax(): Parallax {
    return { ...this.record.parallax };
  }

  /** Longitude, east +ve. */
  long(format?: 'r' | 'd'): number;
  long(format: 's'): string;
  long(format: AngleFormat = 'r'): number | string {
    return formatAngle(this.record.long, format, getSettings().separator);
  }

  /** Geodetic latitude. */
  lat(format?: 'r' | 'd'): number;
  lat(format: 's'): string;
  lat(format: AngleFormat = 'r'): number | string {
    return formatAngle(this.record.lat, format, getSettings().separator);
  }

  geocLat(format?: 'r' | 'd'): number;
  geocLat(format: 's'): string;
  geocLat(format: AngleFormat = 'r'): number | string {
    return formatAngle(this.record.geocLat, format, getSettings().separator);
  }

  limits(): LimitsSpec {
    return copyLimits(this.current);
  }

  setLimits(spec: LimitsSpec): void {
    this.current = checkLimits(spec);
  }

  withName(name: string): Telescope | undefined {
    return Telescope.fromName(name);
  }

  withCode(code: string): Telescope | undefined {
    return Telescope.fromCode(code);
  }

  toJSON(): TelescopeRecord & { limits: LimitsSpec } {
    return { ...this.record, parallax: this.parallax, limits: this.limits() };
  }
}
