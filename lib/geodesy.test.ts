import { describe, it, expect } from 'vitest'
import { radians } from './astroMath'
import {
  E,
  EPS,
  EQU_RAD,
  geocentricToGeodetic,
  geocentricToParallax,
  geodeticToGeocentric,
  parallaxToGeocentric,
} from './geodesy'

const latitudes = [-Math.PI / 2, -1.57079632, -1.5707, -1.5, -1.0, -0.5, -0.1, 0, 0.1, 0.3438, 0.7, 1.2, 1.55, 1.5707, 1.57079632, Math.PI / 2]
const heights = [-50, 0, 100, 4111, 8848, 20000]

describe('geodetic <-> geocentric', () => {
  it('round-trips geodetic positions', () => {
    for (const lat of latitudes) {
      for (const alt of heights) {
        const geoc = geodeticToGeocentric({ lat, alt })
        const back = geoc && geocentricToGeodetic(geoc)
        expect(back).toBeDefined()
        expect(Math.abs((back?.lat ?? NaN) - lat)).toBeLessThan(1e-9)
        expect(Math.abs((back?.alt ?? NaN) - alt)).toBeLessThan(1e-6)
      }
    }
  })

  it('matches the UKIRT geocentric latitude', () => {
    const geoc = geodeticToGeocentric({ lat: radians(19 + 49 / 60 + 20.75 / 3600), alt: 4198.5 })
    expect(geoc?.geocLat).toBeCloseTo(0.343830843, 8)
  })

  it('puts sea level on the equator at the equatorial radius', () => {
    expect(geodeticToGeocentric({ lat: 0, alt: 0 })).toEqual({ geocLat: 0, geocDist: EQU_RAD })
  })

  it('puts sea level at the pole at the polar radius', () => {
    const geoc = geodeticToGeocentric({ lat: Math.PI / 2, alt: 0 })
    expect(geoc?.geocLat).toBeCloseTo(Math.PI / 2, 12)
    expect(geoc?.geocDist).toBeCloseTo(EQU_RAD * E, 3)
  })

  it('measures height on the polar axis from the polar radius', () => {
    const north = geocentricToGeodetic({ geocLat: Math.PI / 2, geocDist: EQU_RAD * E + 10 })
    const south = geocentricToGeodetic({ geocLat: -Math.PI / 2, geocDist: EQU_RAD * E + 10 })
    expect(north?.lat).toBe(Math.PI / 2)
    expect(north?.alt).toBeCloseTo(10, 6)
    expect(south?.lat).toBe(-Math.PI / 2)
    expect(south?.alt).toBeCloseTo(10, 6)
  })

  it('mirrors southern latitudes', () => {
    const north = geocentricToGeodetic({ geocLat: 0.6, geocDist: 6370000 })
    const south = geocentricToGeodetic({ geocLat: -0.6, geocDist: 6370000 })
    expect(south?.lat).toBeCloseTo(-(north?.lat ?? NaN), 14)
    expect(south?.alt).toBeCloseTo(north?.alt ?? NaN, 9)
  })

  it('is undefined without its inputs', () => {
    expect(geodeticToGeocentric({ lat: 0.3 })).toBeUndefined()
    expect(geocentricToGeodetic({ geocDist: 6370000 })).toBeUndefined()
    expect(geodeticToGeocentric({ lat: NaN, alt: 0 })).toBeUndefined()
  })
})

describe('geocentric <-> parallax', () => {
  it('round-trips geocentric positions', () => {
    for (const geocLat of latitudes) {
      for (const geocDist of [6356000, 6371000, 6378100, 6400000]) {
        const par = geocentricToParallax({ geocLat, geocDist })
        const back = par && parallaxToGeocentric(par)
        expect(Math.abs((back?.geocLat ?? NaN) - geocLat)).toBeLessThan(1e-9)
        expect(Math.abs((back?.geocDist ?? NaN) - geocDist)).toBeLessThan(1e-3)
      }
    }
  })

  it('expresses distance in equatorial radii', () => {
    expect(geocentricToParallax({ geocLat: 0, geocDist: EQU_RAD })).toEqual({ C: 0, S: 1 })
    expect(parallaxToGeocentric({ C: 0.6, S: 0.8 })?.geocDist).toBeCloseTo(EQU_RAD, 6)
  })

  it('is undefined without its inputs', () => {
    expect(geocentricToParallax({ geocLat: 0.1 })).toBeUndefined()
    expect(parallaxToGeocentric({ C: 0.5 })).toBeUndefined()
    expect(parallaxToGeocentric({ C: NaN, S: 1 })).toBeUndefined()
  })
})

describe('ellipsoid constants', () => {
  it('EPS is the eccentricity of the ellipsoid', () => {
    expect(EPS).toBeCloseTo(Math.sqrt(1 - E * E), 7)
  })
})
