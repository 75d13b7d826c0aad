import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { radians } from './astroMath';
import { getSettings } from './settings';

export interface MpcObservatory {
  code: string;
  name: string;
  long: number;      // rad, east +ve
  parallaxC: number; // rho sin(phi')
  parallaxS: number; // rho cos(phi')
}

/**
 * Parse the MPC observatory code table. Columns are fixed width:
 * code (3), longitude in degrees (10), rho cos(phi') (8),
 * rho sin(phi') (9), then the name. Entries whose longitude field has
 * no digits (space telescopes) are dropped.
 */
export function parseMpcTable(text: string): Map<string, MpcObservatory> {
  const table = new Map<string, MpcObservatory>();

  for (const raw of text.split(/\r?\n/)) {
    const code = raw.slice(0, 3).trimEnd();
    const long = raw.slice(3, 13);
    if (!code || !/\d/.test(long)) continue;

    table.set(code, {
      code,
      name: raw.slice(30).trimEnd(),
      long: radians(parseFloat(long)),
      parallaxS: parseFloat(raw.slice(13, 21)),
      parallaxC: parseFloat(raw.slice(21, 30)),
    });
  }

  return table;
}

/** Lazily parsed code table; the source is read at most once. */
export class MpcCatalog {
  private table: Map<string, MpcObservatory> | undefined;

  constructor(private readonly source: () => string) {}

  get loaded(): boolean {
    return this.table !== undefined;
  }

  entries(): ReadonlyMap<string, MpcObservatory> {
    this.table ??= parseMpcTable(this.source());
    return this.table;
  }

  lookup(code: string): MpcObservatory | undefined {
    return this.entries().get(code);
  }

  codes(): string[] {
    return [...this.entries().keys()].sort();
  }
}

const DEFAULT_PATH = fileURLToPath(new URL('../data/MPC.dat', import.meta.url));

let shared: { path: string; catalog: MpcCatalog } | undefined;

/**
 * The process-wide code table, read from `settings.mpcTable` or the bundled
 * table. It is read once per configured path and read again after the
 * path changes.
 */
export function mpcCatalog(): MpcCatalog {
  const path = getSettings().mpcTable ?? DEFAULT_PATH;
  if (!shared || shared.path !== path) {
    shared = { path, catalog: new MpcCatalog(() => readFileSync(path, 'utf8')) };
  }
  return shared.catalog;
}
