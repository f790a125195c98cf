/**
 * Tests for settings loading.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { EnvCoercionError } from './env.js';
import { DEFAULT_SETTINGS_FILE, loadSettings } from './loader.js';
import { SettingsParseError } from './parser.js';
import { SettingsValidationError } from './validator.js';

vi.mock('node:fs', async (importOriginal) => {
  const original = await importOriginal<typeof import('node:fs')>();

  return {
    ...original,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

describe('loadSettings', () => {
  beforeEach(() => {
    mockExistsSync.mockReset();
    mockReadFileSync.mockReset();
  });

  it('uses defaults when no settings file exists', () => {
    mockExistsSync.mockReturnValue(false);

    const settings = loadSettings({ env: {} });

    expect(mockExistsSync).toHaveBeenCalledWith(DEFAULT_SETTINGS_FILE);
    expect(mockReadFileSync).not.toHaveBeenCalled();
    expect(settings.features.vrrp).toBe(true);
    expect(settings.scheduler).toEqual({ rt_priority_min: 1, rt_priority_max: 99 });
  });

  it('reads globaldefs.toml from the working directory when present', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue(`
[features]
bfd = false

[hosts]
"mail.example.test" = "192.0.2.25"
`);

    const settings = loadSettings({ env: {} });

    expect(settings.features.bfd).toBe(false);
    expect(settings.hosts).toEqual({ 'mail.example.test': '192.0.2.25' });
  });

  it('throws when an explicitly named file is missing', () => {
    mockExistsSync.mockReturnValue(false);

    expect(() => loadSettings({ path: 'custom.toml', env: {} })).toThrow(
      new SettingsParseError('Settings file not found: custom.toml')
    );
  });

  it('lets the environment override the file', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[logging]\ndebug = false\n');

    const settings = loadSettings({
      path: 'custom.toml',
      env: { GLOBALDEFS_DEBUG: 'yes', GLOBALDEFS_FEATURES_DBUS: 'off' },
    });

    expect(settings.logging.debug).toBe(true);
    expect(settings.features.dbus).toBe(false);
  });

  it('rejects environment values that cannot be coerced', () => {
    mockExistsSync.mockReturnValue(false);

    expect(() => loadSettings({ env: { GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX: 'high' } })).toThrow(
      EnvCoercionError
    );
  });

  it('validates the merged settings', () => {
    mockExistsSync.mockReturnValue(false);

    expect(() =>
      loadSettings({
        env: { GLOBALDEFS_SCHEDULER_RT_PRIORITY_MIN: '60', GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX: '50' },
      })
    ).toThrow(SettingsValidationError);
  });
});
