/**
 * Tests for the directives command.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { DEFAULT_FEATURES } from '../../config/defaults.js';
import { buildDirectiveTable } from '../../parser/registry.js';
import { handleDirectivesCommand } from './directives.js';

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

describe('handleDirectivesCommand', () => {
  beforeEach(() => {
    mockExistsSync.mockReset();
    mockReadFileSync.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should list every directive with default settings', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    mockExistsSync.mockReturnValue(false);

    const result = handleDirectivesCommand([]);

    expect(result.exitCode).toBe(0);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual(buildDirectiveTable(DEFAULT_FEATURES).names());
  });

  it('should honour the settings file', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[features]\ndbus = false\n');

    handleDirectivesCommand(['--settings', 'custom.toml']);

    const printed = logSpy.mock.calls.map((call) => call[0]);
    expect(printed).not.toContain('enable_dbus');
    expect(printed).toContain('router_id');
  });

  it('should reject unexpected arguments', () => {
    expect(() => handleDirectivesCommand(['extra'])).toThrow('Unexpected argument: extra');
    expect(() => handleDirectivesCommand(['--settings'])).toThrow('--settings requires a value');
  });
});
