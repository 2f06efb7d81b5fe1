import { DeterministicClock, MAX_SEED, NoiseSource, isValidSeed } from '@telemetry-analyzer/adapters';
import { PARAMETER_INFO, TELEMETRY_PARAMETERS, ValidationError } from '@telemetry-analyzer/domain';
import type {
  MissionProfile,
  ParameterBounds,
  TelemetryParameter,
  TelemetryRecord,
} from '@telemetry-analyzer/domain';
import { defaultProfile } from '../profiles/builtin-profiles.js';

export const DEFAULT_ANOMALY_RATE = 0.1;

export interface GenerateOptions {
  /** Per-record probability of pushing one parameter out of bounds. */
  anomalyRate?: number;
  /** Profile whose bounds the injected anomalies violate. */
  referenceProfile?: MissionProfile;
}

/** How far past a bound an injected anomaly lands, [min, max). */
const ANOMALY_STEP: Readonly<Record<TelemetryParameter, readonly [number, number]>> = {
  temperature: [2, 20],
  pressure: [0.05, 0.3],
  velocity: [50, 500],
  battery: [2, 15],
  fuel: [2, 15],
};

type Side = 'below' | 'above';

interface InjectionTarget {
  parameter: TelemetryParameter;
  side: Side;
  bound: number;
}

const round2 = (v: number) => Math.round(v * 100) / 100;

function clampPhysical(parameter: TelemetryParameter, value: number): number {
  const { physicalMin, physicalMax } = PARAMETER_INFO[parameter];
  return Math.min(physicalMax, Math.max(physicalMin, value));
}

/** Bound sides that can be violated without leaving the physical range. */
function injectionTargets(profile: MissionProfile): InjectionTarget[] {
  const targets: InjectionTarget[] = [];
  for (const parameter of TELEMETRY_PARAMETERS) {
    const { lowerBound, upperBound } = profile.bounds[parameter];
    const { physicalMin, physicalMax } = PARAMETER_INFO[parameter];
    if (Number.isFinite(lowerBound) && physicalMin < lowerBound) {
      targets.push({ parameter, side: 'below', bound: lowerBound });
    }
    if (Number.isFinite(upperBound) && physicalMax > upperBound) {
      targets.push({ parameter, side: 'above', bound: upperBound });
    }
  }
  return targets;
}

function anomalousValue(target: InjectionTarget, noise: NoiseSource): number {
  const [minStep, maxStep] = ANOMALY_STEP[target.parameter];
  const step = round2(noise.uniform(minStep, maxStep));
  const { physicalMin, physicalMax } = PARAMETER_INFO[target.parameter];
  if (target.side === 'below') {
    const value = target.bound - step;
    return value < physicalMin ? (physicalMin + target.bound) / 2 : value;
  }
  const value = target.bound + step;
  return value > physicalMax ? (physicalMax + target.bound) / 2 : value;
}

interface DriftShape {
  /** Typical healthy reading, used where the profile leaves a side open. */
  nominal: number;
  /** Width of the open side of the band. */
  span: number;
  period: number;
  phase: number;
}

const DRIFT_SHAPE: Readonly<Record<TelemetryParameter, DriftShape>> = {
  temperature: { nominal: 22, span: 30, period: 48, phase: 0 },
  pressure: { nominal: 1.0, span: 0.3, period: 72, phase: 1 },
  velocity: { nominal: 7100, span: 400, period: 96, phase: 0 },
  battery: { nominal: 85, span: 30, period: 60, phase: 2 },
  fuel: { nominal: 90, span: 30, period: 120, phase: 0.5 },
};

// Share of the band's half-width taken by the slow wave and by the noise.
// Their sum (0.45) keeps every reading inside the band before rounding.
const DRIFT_SHARE = 0.3;
const NOISE_SHARE = 0.15;

export interface Band {
  low: number;
  high: number;
}

/**
 * Where healthy readings of `parameter` wander: inside every finite bound of
 * the reference profile and inside the physical range.
 */
export function nominalBand(parameter: TelemetryParameter, bounds: ParameterBounds): Band {
  const { nominal, span } = DRIFT_SHAPE[parameter];
  const { lowerBound, upperBound } = bounds;
  const hasLower = Number.isFinite(lowerBound);
  const hasUpper = Number.isFinite(upperBound);

  let low: number;
  let high: number;
  if (hasLower && hasUpper) {
    low = lowerBound;
    high = upperBound;
  } else if (hasLower) {
    low = lowerBound;
    high = Math.max(lowerBound, nominal) + span;
  } else if (hasUpper) {
    low = Math.min(upperBound, nominal) - span;
    high = upperBound;
  } else {
    low = nominal - span;
    high = nominal + span;
  }

  const { physicalMin, physicalMax } = PARAMETER_INFO[parameter];
  low = Math.max(low, physicalMin);
  high = Math.min(high, physicalMax);
  if (low > high) {
    // The profile asks for physically impossible values; pin to the nearest possible one
    const pinned = clampPhysical(parameter, hasLower ? lowerBound : upperBound);
    return { low: pinned, high: pinned };
  }
  return { low, high };
}

function baseline(
  i: number,
  bands: Readonly<Record<TelemetryParameter, Band>>,
  noise: NoiseSource,
): Record<TelemetryParameter, number> {
  const reading = (parameter: TelemetryParameter): number => {
    const { low, high } = bands[parameter];
    const { period, phase } = DRIFT_SHAPE[parameter];
    const mid = (low + high) / 2;
    const halfWidth = (high - low) / 2;
    const wave = Math.sin((2 * Math.PI * i) / period + phase);
    const value = mid + halfWidth * (DRIFT_SHARE * wave + noise.jitter(NOISE_SHARE));
    return Math.min(high, Math.max(low, round2(value)));
  };
  return {
    temperature: reading('temperature'),
    pressure: reading('pressure'),
    velocity: reading('velocity'),
    battery: reading('battery'),
    fuel: reading('fuel'),
  };
}

function validateArgs(
  count: number,
  start: Date,
  intervalMinutes: number,
  seed: number,
  anomalyRate: number,
): void {
  const issues: string[] = [];
  if (!Number.isInteger(count) || count < 0) issues.push('count must be a non-negative integer');
  if (Number.isNaN(start.getTime())) issues.push('startTimestamp must be a valid date');
  if (!Number.isFinite(intervalMinutes) || intervalMinutes <= 0) issues.push('intervalMinutes must be positive');
  if (!isValidSeed(seed)) issues.push(`seed must be an integer in [0, ${MAX_SEED}]`);
  if (!(anomalyRate >= 0 && anomalyRate <= 1)) issues.push('anomalyRate must be within [0, 1]');
  if (issues.length > 0) throw new ValidationError(issues.join('; '), issues);
}

/**
 * Synthetic telemetry for demonstrations: slow drift plus bounded noise inside
 * the reference profile's bounds, with a share of records pushed outside them.
 * At `anomalyRate: 0` no record violates the reference profile.
 *
 * Output is a pure function of the arguments; timestamps depend only on
 * `startTimestamp` and `intervalMinutes`, never on the seed.
 */
export function generate(
  count: number,
  startTimestamp: Date,
  intervalMinutes: number,
  seed: number,
  options: GenerateOptions = {},
): TelemetryRecord[] {
  const anomalyRate = options.anomalyRate ?? DEFAULT_ANOMALY_RATE;
  validateArgs(count, startTimestamp, intervalMinutes, seed, anomalyRate);

  const reference = options.referenceProfile ?? defaultProfile();
  const noise = new NoiseSource(seed);
  const clock = DeterministicClock.everyMinutes(startTimestamp, intervalMinutes);
  const targets = injectionTargets(reference);
  const bands = {
    temperature: nominalBand('temperature', reference.bounds.temperature),
    pressure: nominalBand('pressure', reference.bounds.pressure),
    velocity: nominalBand('velocity', reference.bounds.velocity),
    battery: nominalBand('battery', reference.bounds.battery),
    fuel: nominalBand('fuel', reference.bounds.fuel),
  };

  const records: TelemetryRecord[] = [];
  for (let i = 0; i < count; i++) {
    const values = baseline(i, bands, noise);
    if (targets.length > 0 && noise.chance(anomalyRate)) {
      const target = noise.pick(targets);
      values[target.parameter] = anomalousValue(target, noise);
    }
    records.push({ ts: clock.now(), ...values });
  }
  return records;
}
