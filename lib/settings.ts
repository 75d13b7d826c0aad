import { z } from 'zod';

export const SettingsZ = z.object({
  // digits, signs or a point would make the sexagesimal output ambiguous
  separator: z.string().regex(/^[^\d.+-]*$/, 'separator must not contain digits, signs or "."').default(' '),
  mpcTable: z.string().min(1).optional(),
  observatories: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsZ>;

type Env = Record<string, string | undefined>;

export function loadSettings(env: Env = process.env): Settings {
  const parsed = SettingsZ.safeParse({
    separator: env.TELESCOPE_SEPARATOR || undefined,
    mpcTable: env.TELESCOPE_MPC_TABLE || undefined,
    observatories: env.TELESCOPE_OBSERVATORIES || undefined,
  });
  if (parsed.success) return parsed.data;

  console.warn(`[settings] ignoring environment overrides: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  return SettingsZ.parse({});
}

let current: Settings | undefined;

export function getSettings(): Settings {
  current ??= loadSettings();
  return current;
}

export function updateSettings(patch: Partial<Settings>): Settings {
  current = SettingsZ.parse({ ...getSettings(), ...patch });
  return current;
}

export function resetSettings(): void {
  current = undefined;
}
