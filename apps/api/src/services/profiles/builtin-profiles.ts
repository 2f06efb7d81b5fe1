import type { MissionProfile, ParameterBounds, ProfileBounds } from '@telemetry-analyzer/domain';

const BUILT_IN_EPOCH = new Date(0);

const between = (lowerBound: number, upperBound: number): ParameterBounds => ({ lowerBound, upperBound });
const atLeast = (lowerBound: number): ParameterBounds => ({ lowerBound, upperBound: Infinity });
const unchecked: ParameterBounds = { lowerBound: -Infinity, upperBound: Infinity };

function builtIn(name: string, bounds: ProfileBounds): MissionProfile {
  return Object.freeze({ name, builtIn: true, bounds: Object.freeze(bounds), createdAt: BUILT_IN_EPOCH });
}

export const DEFAULT_PROFILE_NAME = 'Default';

/** Presentation order is the order of this list. */
export const BUILTIN_PROFILES: readonly MissionProfile[] = [
  builtIn(DEFAULT_PROFILE_NAME, {
    temperature: between(0, 40),
    pressure: between(0.8, 1.2),
    velocity: unchecked,
    battery: atLeast(20),
    fuel: atLeast(20),
  }),
  builtIn('LEO Satellite', {
    temperature: between(-5, 35),
    pressure: between(0.9, 1.1),
    velocity: unchecked,
    battery: atLeast(30),
    fuel: atLeast(25),
  }),
  builtIn('Deep Space Probe', {
    temperature: between(-20, 30),
    pressure: between(0.7, 1.0),
    velocity: unchecked,
    battery: atLeast(40),
    fuel: atLeast(35),
  }),
  builtIn('Mars Mission', {
    temperature: between(-40, 25),
    pressure: between(0.6, 0.9),
    velocity: unchecked,
    battery: atLeast(50),
    fuel: atLeast(40),
  }),
  builtIn('Venus Orbiter', {
    temperature: between(10, 60),
    pressure: between(0.8, 1.2),
    velocity: unchecked,
    battery: atLeast(35),
    fuel: atLeast(30),
  }),
  builtIn('Lunar Lander', {
    temperature: between(-30, 40),
    pressure: between(0.85, 1.05),
    velocity: unchecked,
    battery: atLeast(45),
    fuel: atLeast(20),
  }),
];

export function defaultProfile(): MissionProfile {
  const profile = BUILTIN_PROFILES.find((p) => p.name === DEFAULT_PROFILE_NAME);
  if (!profile) throw new Error(`built-in profile ${DEFAULT_PROFILE_NAME} is not defined`);
  return profile;
}
