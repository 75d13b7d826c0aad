import { describe, it, expect, afterEach, vi } from 'vitest'
import { getSettings, loadSettings, resetSettings, updateSettings } from './settings'

describe('Settings', () => {
  afterEach(() => {
    resetSettings()
    vi.restoreAllMocks()
  })

  it('loads defaults from an empty environment', () => {
    expect(loadSettings({})).toEqual({ separator: ' ' })
  })

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      TELESCOPE_SEPARATOR: ':',
      TELESCOPE_MPC_TABLE: '/data/ObsCodes.dat',
      TELESCOPE_OBSERVATORIES: '',
    })

    expect(settings.separator).toBe(':')
    expect(settings.mpcTable).toBe('/data/ObsCodes.dat')
    expect(settings.observatories).toBeUndefined()
  })

  it('treats an empty separator as unset', () => {
    expect(loadSettings({ TELESCOPE_SEPARATOR: '' }).separator).toBe(' ')
  })

  it('falls back to defaults when the environment is invalid', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const settings = loadSettings({ TELESCOPE_SEPARATOR: '.' })

    expect(settings.separator).toBe(' ')
    expect(warn).toHaveBeenCalledWith(
      '[settings] ignoring environment overrides: separator must not contain digits, signs or "."'
    )
  })

  it('updates the current settings', () => {
    const updated = updateSettings({ separator: '/' })

    expect(updated.separator).toBe('/')
    expect(getSettings().separator).toBe('/')
  })

  it('rejects invalid updates', () => {
    expect(() => updateSettings({ separator: '0' })).toThrow()
    expect(getSettings().separator).toBe(' ')
  })
})
