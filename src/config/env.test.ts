import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  applyEnvOverrides,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
import { getDefaultSettings } from './parser.js';
import { FEATURE_NAMES } from './types.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map GLOBALDEFS_FEATURES_* to feature flags', () => {
      const result = readEnvOverrides({
        GLOBALDEFS_FEATURES_BFD: 'false',
        GLOBALDEFS_FEATURES_IPVS_SYNCD_ATTRIBUTES: 'no',
      });

      expect(result.overrides.features).toEqual({ bfd: false, ipvs_syncd_attributes: false });
      expect(result.appliedVars).toEqual([
        'GLOBALDEFS_FEATURES_BFD',
        'GLOBALDEFS_FEATURES_IPVS_SYNCD_ATTRIBUTES',
      ]);
    });

    it('should coerce scheduler bounds to integers', () => {
      const result = readEnvOverrides({
        GLOBALDEFS_SCHEDULER_RT_PRIORITY_MIN: '5',
        GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX: ' 50 ',
      });

      expect(result.overrides.scheduler).toEqual({ rt_priority_min: 5, rt_priority_max: 50 });
    });

    it('should accept the GLOBALDEFS_DEBUG shortcut', () => {
      const result = readEnvOverrides({ GLOBALDEFS_DEBUG: 'YES' });

      expect(result.overrides.logging?.debug).toBe(true);
    });

    it('should ignore empty and unrelated variables', () => {
      const result = readEnvOverrides({ GLOBALDEFS_FEATURES_VRRP: '', HOME: '/root' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for a non-boolean flag', () => {
      expect(() => readEnvOverrides({ GLOBALDEFS_FEATURES_LVS: 'maybe' })).toThrow(
        EnvCoercionError
      );
    });

    it('should throw EnvCoercionError for a fractional bound', () => {
      try {
        readEnvOverrides({ GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX: '9.5' });
        expect.unreachable('expected coercion to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        if (error instanceof EnvCoercionError) {
          expect(error.envVar).toBe('GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX');
          expect(error.rawValue).toBe('9.5');
          expect(error.expectedType).toBe('integer');
        }
      }
    });

    it('should collect errors when asked to', () => {
      const result = readEnvOverrides(
        { GLOBALDEFS_FEATURES_LVS: 'maybe', GLOBALDEFS_FEATURES_DBUS: 'off' },
        { collectErrors: true }
      );

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('GLOBALDEFS_FEATURES_LVS');
      expect(result.overrides.features).toEqual({ dbus: false });
    });

    it('should round-trip any boolean for any feature (property-based)', () => {
      fc.assert(
        fc.property(fc.constantFrom(...FEATURE_NAMES), fc.boolean(), (feature, enabled) => {
          const envVar = `GLOBALDEFS_FEATURES_${feature.toUpperCase()}`;
          const result = readEnvOverrides({ [envVar]: String(enabled) });
          return result.overrides.features?.[feature] === enabled;
        })
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let the environment win over file values', () => {
      const base = getDefaultSettings();
      base.hosts = { 'mail.example.test': '192.0.2.25' };

      const merged = applyEnvOverrides(base, { GLOBALDEFS_FEATURES_SNMP: '0' });

      expect(merged.features.snmp).toBe(false);
      expect(merged.features.vrrp).toBe(true);
      expect(merged.hosts).toEqual({ 'mail.example.test': '192.0.2.25' });
    });

    it('should not mutate the base settings', () => {
      const base = getDefaultSettings();

      applyEnvOverrides(base, { GLOBALDEFS_FEATURES_SNMP: '0' });

      expect(base.features.snmp).toBe(true);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document one variable per feature plus scheduler and logging', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toHaveLength(FEATURE_NAMES.length + 4);
      expect(docs.GLOBALDEFS_FEATURES_DBUS?.type).toBe('boolean');
      expect(docs.GLOBALDEFS_SCHEDULER_RT_PRIORITY_MIN?.type).toBe('integer');
    });
  });
});
