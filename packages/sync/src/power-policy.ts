/**
 * Power/thermal-aware sync tuning.
 *
 * Maps the device's power and thermal state to a batch size and a base sync
 * interval. The mapping is a pure function; the sync engine applies its
 * result to the next scheduled cycle.
 *
 * @module power-policy
 */

import { ValidationError } from '@tidesync/core';
import { BehaviorSubject, type Observable } from 'rxjs';

export type ThermalState = 'nominal' | 'fair' | 'serious' | 'critical';

export interface PowerState {
  /** Whether the OS-level low power mode is on */
  lowPowerMode: boolean;
  thermalState: ThermalState;
}

/**
 * Tuning tier selected by {@link tuneForPower}
 */
export type SyncProfile = 'default' | 'low-power' | 'thermal-backoff';

export interface SyncTuning {
  /** Records per upload batch */
  batchSize: number;
  /** Delay between scheduled cycles in ms */
  baseIntervalMs: number;
}

export interface PowerTuning extends SyncTuning {
  profile: SyncProfile;
}

export type PowerTiers = Record<SyncProfile, SyncTuning>;

export const DEFAULT_POWER_TIERS: PowerTiers = {
  default: { batchSize: 100, baseIntervalMs: 30_000 },
  'low-power': { batchSize: 50, baseIntervalMs: 120_000 },
  'thermal-backoff': { batchSize: 10, baseIntervalMs: 600_000 },
};

/**
 * Select the profile for a power state.
 *
 * Serious or critical thermal pressure wins over everything, then low power
 * mode; anything else runs the default profile.
 */
export function selectProfile(state: PowerState): SyncProfile {
  if (state.thermalState === 'serious' || state.thermalState === 'critical') {
    return 'thermal-backoff';
  }
  if (state.lowPowerMode) return 'low-power';
  return 'default';
}

/**
 * Map a power state to the tuning for the next sync cycle
 */
export function tuneForPower(
  state: PowerState,
  tiers: PowerTiers = DEFAULT_POWER_TIERS
): PowerTuning {
  const profile = selectProfile(state);
  return { profile, ...tiers[profile] };
}

/**
 * Fill partial tier overrides from the defaults and check every value is
 * positive.
 *
 * @throws ValidationError (TIDE_V101)
 */
export function resolvePowerTiers(overrides: Partial<Record<SyncProfile, Partial<SyncTuning>>> = {}): PowerTiers {
  const tiers: PowerTiers = {
    default: { ...DEFAULT_POWER_TIERS.default, ...overrides.default },
    'low-power': { ...DEFAULT_POWER_TIERS['low-power'], ...overrides['low-power'] },
    'thermal-backoff': {
      ...DEFAULT_POWER_TIERS['thermal-backoff'],
      ...overrides['thermal-backoff'],
    },
  };

  const errors = Object.entries(tiers).flatMap(([profile, tuning]) => [
    ...(isPositiveInteger(tuning.batchSize)
      ? []
      : [{ path: `powerTiers.${profile}.batchSize`, message: 'must be a positive integer' }]),
    ...(tuning.baseIntervalMs > 0
      ? []
      : [{ path: `powerTiers.${profile}.baseIntervalMs`, message: 'must be positive' }]),
  ]);

  if (errors.length > 0) {
    throw new ValidationError(errors, undefined, 'TIDE_V101');
  }
  return tiers;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Source of device power/thermal updates.
 */
export interface PowerStateSource {
  observe(): Observable<PowerState>;
}

/**
 * Power state source driven by explicit calls, for hosts that report power
 * changes through their own APIs (and for tests).
 */
export interface ManualPowerStateSource extends PowerStateSource {
  setState(state: PowerState): void;
  /** Current state */
  readonly state: PowerState;
}

export function createManualPowerStateSource(
  initial: PowerState = { lowPowerMode: false, thermalState: 'nominal' }
): ManualPowerStateSource {
  const state$ = new BehaviorSubject<PowerState>(initial);

  return {
    observe: () => state$.asObservable(),
    setState: (state) => state$.next(state),
    get state() {
      return state$.getValue();
    },
  };
}
