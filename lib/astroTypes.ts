export interface Geodetic {
  lat: number; // rad, geodetic
  alt: number; // m above the ellipsoid
}

export interface Geocentric {
  geocLat: number;  // rad
  geocDist: number; // m from the Earth's centre
}

export interface Parallax {
  C: number; // rho sin(phi'), Earth radii
  S: number; // rho cos(phi'), Earth radii
}

export type NativeRepresentation = 'geodetic' | 'geocentric' | 'parallax';

export interface AxisRange {
  min: number; // rad
  max: number; // rad
}

export type LimitsSpec =
  | { type: 'AZEL'; el: AxisRange }
  | { type: 'HADEC'; ha: AxisRange; dec: AxisRange }
  | { type: 'NONE' };

export type MountType = LimitsSpec['type'];

export interface TelescopeRecord {
  name: string;
  fullName: string;
  obsCode?: string;
  long: number; // rad, east +ve
  lat: number;
  alt: number;
  geocLat: number;
  geocDist: number;
  parallax: Parallax;
  native: NativeRepresentation;
}

export interface TelescopeFields {
  name?: string;
  fullName?: string;
  obsCode?: string;
  long?: number;
  lat?: number;
  alt?: number;
  geocLat?: number;
  geocDist?: number;
  parallax?: Partial<Parallax>;
}
