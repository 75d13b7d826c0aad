import { z } from 'zod';
import { hoursToRadians, radians } from './astroMath';
import type { LimitsSpec } from './astroTypes';

const RangeZ = z.object({ min: z.number(), max: z.number() })
  .refine(r => r.min <= r.max, { message: 'min must not exceed max' });

export const LimitsZ = z.discriminatedUnion('type', [
  z.object({ type: z.literal('AZEL'), el: RangeZ }),
  z.object({ type: z.literal('HADEC'), ha: RangeZ, dec: RangeZ }),
  z.object({ type: z.literal('NONE') }),
]);

const LIMITS: Record<string, LimitsSpec> = {
  JCMT: {
    type: 'AZEL',
    el: { min: radians(5), max: radians(88) },
  },
  UKIRT: {
    type: 'HADEC',
    ha: { min: hoursToRadians(-4.5), max: hoursToRadians(4.5) },
    dec: { min: radians(-42), max: radians(60) },
  },
};

// Anything not listed can point anywhere above the horizon
const HORIZON: LimitsSpec = { type: 'AZEL', el: { min: 0, max: Math.PI / 2 } };

export function copyLimits(spec: LimitsSpec): LimitsSpec {
  switch (spec.type) {
    case 'AZEL':
      return { type: 'AZEL', el: { ...spec.el } };
    case 'HADEC':
      return { type: 'HADEC', ha: { ...spec.ha }, dec: { ...spec.dec } };
    case 'NONE':
      return { type: 'NONE' };
  }
}

export function defaultLimits(name: string): LimitsSpec {
  return copyLimits(Object.hasOwn(LIMITS, name) ? LIMITS[name] : HORIZON);
}

/** Validate a caller-supplied spec, returning an independent copy. */
export function checkLimits(spec: LimitsSpec): LimitsSpec {
  return copyLimits(LimitsZ.parse(spec));
}
