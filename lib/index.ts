export { Telescope, UnknownTelescopeError } from './telescope';
export {
  EQU_RAD,
  E,
  EPS,
  geodeticToGeocentric,
  geocentricToGeodetic,
  geocentricToParallax,
  parallaxToGeocentric,
} from './geodesy';
export { parseMpcTable, MpcCatalog, mpcCatalog, type MpcObservatory } from './mpc';
export { observatoryAt, findObservatory, observatoryNames, SENTINEL, type ObservatoryEntry } from './observatories';
export { defaultLimits, LimitsZ } from './limits';
export { formatAngle, formatSexagesimal, parseSexagesimal, radiansToDms, type AngleFormat } from './astroMath';
export { loadSettings, getSettings, updateSettings, resetSettings, type Settings } from './settings';
export type * from './astroTypes';
