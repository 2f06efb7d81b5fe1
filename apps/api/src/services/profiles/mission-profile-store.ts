import { wallClockNow } from '@telemetry-analyzer/adapters';
import {
  NotFoundError,
  TELEMETRY_PARAMETERS,
  ValidationError,
  isTelemetryParameter,
} from '@telemetry-analyzer/domain';
import type {
  BoundsOverrides,
  MissionProfile,
  ParameterBounds,
  ProfileBounds,
} from '@telemetry-analyzer/domain';
import { BUILTIN_PROFILES } from './builtin-profiles.js';

const MAX_NAME_LENGTH = 80;

/** Loose input shape: callers may hand over anything keyed by name. */
export type BoundsInput = Readonly<Record<string, Partial<ParameterBounds> | undefined>>;

/**
 * In-memory registry of mission profiles.
 *
 * Built-ins are read-only and listed first in their fixed order; user
 * profiles follow in creation order. Stored profiles are frozen, so an edit
 * always produces a new object and a profile already handed to an analysis
 * pass never changes underneath it.
 */
export class MissionProfileStore {
  private readonly builtIns = new Map<string, MissionProfile>();
  private readonly userProfiles = new Map<string, MissionProfile>();

  constructor(
    builtIns: readonly MissionProfile[] = BUILTIN_PROFILES,
    private readonly now: () => Date = wallClockNow,
  ) {
    for (const p of builtIns) this.builtIns.set(p.name, p);
  }

  getProfile(name: string): MissionProfile {
    const profile = this.builtIns.get(name) ?? this.userProfiles.get(name);
    if (!profile) throw new NotFoundError('mission profile', name);
    return profile;
  }

  hasProfile(name: string): boolean {
    return this.builtIns.has(name) || this.userProfiles.has(name);
  }

  listProfiles(): string[] {
    return [...this.builtIns.keys(), ...this.userProfiles.keys()];
  }

  isBuiltIn(name: string): boolean {
    return this.builtIns.has(name);
  }

  saveProfile(name: string, boundsMap: BoundsInput): MissionProfile {
    return this.commit(this.prepareProfile(name, boundsMap));
  }

  /** Copy-on-edit: new profile from an existing one plus per-side overrides. */
  cloneProfile(sourceName: string, newName: string, overrides: BoundsOverrides = {}): MissionProfile {
    return this.commit(this.prepareClone(sourceName, newName, overrides));
  }

  /**
   * Validates and builds the profile `saveProfile` would store, without
   * storing it. Pair with `commit` once the profile has been persisted.
   */
  prepareProfile(name: string, boundsMap: BoundsInput): MissionProfile {
    const key = this.validateName(name);
    const bounds = validateBounds(boundsMap);
    return Object.freeze({
      name: key,
      builtIn: false,
      bounds,
      createdAt: this.userProfiles.get(key)?.createdAt ?? this.now(),
    });
  }

  prepareClone(sourceName: string, newName: string, overrides: BoundsOverrides = {}): MissionProfile {
    const source = this.getProfile(sourceName);
    const merged: Record<string, Partial<ParameterBounds>> = {};
    for (const p of TELEMETRY_PARAMETERS) {
      merged[p] = { ...source.bounds[p], ...overrides[p] };
    }
    return this.prepareProfile(newName, merged);
  }

  /** Stores a profile built by `prepareProfile` or `prepareClone`. */
  commit(profile: MissionProfile): MissionProfile {
    if (profile.builtIn || this.builtIns.has(profile.name)) {
      throw new ValidationError(`built-in profile "${profile.name}" is read-only`);
    }
    // Map.set on an existing key keeps its position: overwrites do not reorder
    this.userProfiles.set(profile.name, profile);
    return profile;
  }

  /** Loads persisted user profiles, e.g. at start-up. */
  hydrate(profiles: readonly MissionProfile[]): number {
    let loaded = 0;
    for (const p of profiles) {
      if (this.builtIns.has(p.name)) {
        console.warn(`[profile-store] ignoring stored profile shadowing built-in "${p.name}"`);
        continue;
      }
      const bounds = validateBounds(p.bounds);
      this.userProfiles.set(p.name, Object.freeze({ ...p, builtIn: false, bounds }));
      loaded++;
    }
    return loaded;
  }

  private validateName(name: string): string {
    const key = name.trim();
    if (key === '') throw new ValidationError('profile name must not be blank');
    if (key.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`profile name must be at most ${MAX_NAME_LENGTH} characters`);
    }
    if (this.builtIns.has(key)) {
      throw new ValidationError(`built-in profile "${key}" is read-only`);
    }
    return key;
  }
}

/**
 * Requires exactly the five parameters, each with numeric bounds and
 * lower <= upper. Reports every problem at once.
 */
export function validateBounds(boundsMap: BoundsInput): ProfileBounds {
  const issues: string[] = [];

  for (const key of Object.keys(boundsMap)) {
    if (!isTelemetryParameter(key)) issues.push(`unknown parameter "${key}"`);
  }

  const checked: Partial<Record<string, ParameterBounds>> = {};
  for (const p of TELEMETRY_PARAMETERS) {
    const entry = boundsMap[p];
    if (!entry) {
      issues.push(`${p}: bounds are required`);
      continue;
    }
    const { lowerBound, upperBound } = entry;
    if (typeof lowerBound !== 'number' || Number.isNaN(lowerBound) || lowerBound === Infinity) {
      issues.push(`${p}: lowerBound must be a number or -Infinity`);
      continue;
    }
    if (typeof upperBound !== 'number' || Number.isNaN(upperBound) || upperBound === -Infinity) {
      issues.push(`${p}: upperBound must be a number or Infinity`);
      continue;
    }
    if (lowerBound > upperBound) {
      issues.push(`${p}: lowerBound ${lowerBound} exceeds upperBound ${upperBound}`);
      continue;
    }
    checked[p] = Object.freeze({ lowerBound, upperBound });
  }

  const { temperature, pressure, velocity, battery, fuel } = checked;
  if (issues.length > 0 || !temperature || !pressure || !velocity || !battery || !fuel) {
    throw new ValidationError(`invalid profile bounds: ${issues.join('; ')}`, issues);
  }
  return Object.freeze({ temperature, pressure, velocity, battery, fuel });
}
