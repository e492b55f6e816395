import { ValidationError } from '@tidesync/core';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_POWER_TIERS,
  createManualPowerStateSource,
  resolvePowerTiers,
  selectProfile,
  tuneForPower,
  type PowerState,
  type SyncProfile,
  type ThermalState,
} from './power-policy.js';

describe('selectProfile', () => {
  it.each<{ lowPowerMode: boolean; thermalState: ThermalState; profile: SyncProfile }>([
    { lowPowerMode: false, thermalState: 'nominal', profile: 'default' },
    { lowPowerMode: false, thermalState: 'fair', profile: 'default' },
    { lowPowerMode: true, thermalState: 'nominal', profile: 'low-power' },
    { lowPowerMode: true, thermalState: 'fair', profile: 'low-power' },
    { lowPowerMode: false, thermalState: 'serious', profile: 'thermal-backoff' },
    { lowPowerMode: true, thermalState: 'serious', profile: 'thermal-backoff' },
    { lowPowerMode: false, thermalState: 'critical', profile: 'thermal-backoff' },
    { lowPowerMode: true, thermalState: 'critical', profile: 'thermal-backoff' },
  ])('lowPowerMode=$lowPowerMode thermal=$thermalState -> $profile', ({ lowPowerMode, thermalState, profile }) => {
    expect(selectProfile({ lowPowerMode, thermalState })).toBe(profile);
  });
});

describe('tuneForPower', () => {
  it('should order tiers from default to most aggressive backoff', () => {
    const normal = tuneForPower({ lowPowerMode: false, thermalState: 'nominal' });
    const lowPower = tuneForPower({ lowPowerMode: true, thermalState: 'fair' });
    const hot = tuneForPower({ lowPowerMode: true, thermalState: 'serious' });

    expect(normal).toEqual({ profile: 'default', batchSize: 100, baseIntervalMs: 30_000 });
    expect(lowPower).toEqual({ profile: 'low-power', batchSize: 50, baseIntervalMs: 120_000 });
    expect(hot).toEqual({ profile: 'thermal-backoff', batchSize: 10, baseIntervalMs: 600_000 });
  });

  it('should use custom tiers', () => {
    const tiers = resolvePowerTiers({ 'thermal-backoff': { batchSize: 1 } });
    const state: PowerState = { lowPowerMode: false, thermalState: 'critical' };

    expect(tuneForPower(state, tiers)).toEqual({
      profile: 'thermal-backoff',
      batchSize: 1,
      baseIntervalMs: 600_000,
    });
  });
});

describe('resolvePowerTiers', () => {
  it('should return the defaults without overrides', () => {
    expect(resolvePowerTiers()).toEqual(DEFAULT_POWER_TIERS);
  });

  it('should reject non-positive values', () => {
    expect(() => resolvePowerTiers({ default: { batchSize: 0 } })).toThrow(ValidationError);

    try {
      resolvePowerTiers({ 'low-power': { baseIntervalMs: -1, batchSize: 2.5 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('TIDE_V101');
        expect(error.errors.map((e) => e.path)).toEqual([
          'powerTiers.low-power.batchSize',
          'powerTiers.low-power.baseIntervalMs',
        ]);
      }
    }
  });
});

describe('createManualPowerStateSource', () => {
  it('should replay the current state and emit updates', () => {
    const source = createManualPowerStateSource();
    const seen: PowerState[] = [];
    source.observe().subscribe((state) => seen.push(state));

    source.setState({ lowPowerMode: true, thermalState: 'fair' });

    expect(seen).toEqual([
      { lowPowerMode: false, thermalState: 'nominal' },
      { lowPowerMode: true, thermalState: 'fair' },
    ]);
    expect(source.state).toEqual({ lowPowerMode: true, thermalState: 'fair' });
  });
});
