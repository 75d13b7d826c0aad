import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { parseSexagesimal, radians } from './astroMath';
import { getSettings } from './settings';

// Name field returned once the enumeration runs off the end of the catalog
export const SENTINEL = '?';

const sexagesimal = z.string().transform((text, ctx) => {
  const deg = parseSexagesimal(text);
  if (deg === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a sexagesimal angle: "${text}"` });
    return z.NEVER;
  }
  return radians(deg);
});

const ObservatoryZ = z.object({
  mnemonic: z.string().min(1),
  name: z.string().min(1),
  west: sexagesimal,
  lat: sexagesimal,
  alt: z.number(),
});

const CatalogZ = z.array(ObservatoryZ);

/** A catalog entry, angles in radians, longitude west +ve. */
export interface ObservatoryEntry {
  mnemonic: string;
  name: string;
  west: number;
  lat: number;
  alt: number;
}

// Mauna Kea, Palomar etc. have MPC codes; most catalog entries do not
const OBS_CODES: Record<string, string> = {
  JCMT: '568',
  UKIRT: '568',
  MAUNAK88: '568',
  CFHT: '568',
  KECK1: '568',
  KECK2: '568',
  SUBARU: '568',
  GEMININ: '568',
  IRTF: '568',
  CSO: '568',
  PALOMAR200: '675',
  PALOMAR60: '675',
  PALOMAR48: '675',
  KPNO158: '695',
  KPNO90: '695',
  KPNO84: '695',
  LICK120: '662',
  'APO3.5': '705',
  'MCDONLD2.7': '711',
  'MCDONLD2.1': '711',
  TOLOLO4M: '807',
  'TOLOLO1.5M': '807',
  'ESO3.6': '809',
  ESONTT: '809',
  ESOSCHM: '809',
  AAT: '413',
  UKST: '260',
  ARECIBO: '251',
  'LPO4.2': '950',
  'LPO2.5': '950',
  LPO1: '950',
  'HPROV1.93': '511',
  'HPROV1.52': '511',
  VLT1: '309',
  VLT2: '309',
  VLT3: '309',
  VLT4: '309',
};

const DEFAULT_PATH = fileURLToPath(new URL('../data/observatories.json', import.meta.url));

let cache: { path: string; entries: ObservatoryEntry[] } | undefined;

// Read once per configured path, and again after the path changes
function catalog(): ObservatoryEntry[] {
  const path = getSettings().observatories ?? DEFAULT_PATH;
  if (!cache || cache.path !== path) {
    cache = { path, entries: CatalogZ.parse(JSON.parse(readFileSync(path, 'utf8'))) };
  }
  return cache.entries;
}

/**
 * Entry `index` of the catalog, counting from 1. Past the end the name
 * field is the sentinel "?".
 */
export function observatoryAt(index: number): ObservatoryEntry {
  const entry = index >= 1 ? catalog()[index - 1] : undefined;
  return entry ?? { mnemonic: '', name: SENTINEL, west: 0, lat: 0, alt: 0 };
}

export function findObservatory(mnemonic: string): ObservatoryEntry | undefined {
  for (let i = 1; ; i++) {
    const entry = observatoryAt(i);
    if (entry.name === SENTINEL) return undefined;
    if (entry.mnemonic === mnemonic) return entry;
  }
}

export function observatoryNames(): string[] {
  const names: string[] = [];
  for (let i = 1; ; i++) {
    const entry = observatoryAt(i);
    if (entry.name === SENTINEL) break;
    names.push(entry.mnemonic);
  }
  return names.sort();
}

export function obsCodeFor(mnemonic: string): string | undefined {
  return Object.hasOwn(OBS_CODES, mnemonic) ? OBS_CODES[mnemonic] : undefined;
}
