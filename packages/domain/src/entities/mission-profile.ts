import type { TelemetryParameter } from './telemetry-parameter.js';

/** Inclusive range; an unchecked side is -Infinity / Infinity. */
export interface ParameterBounds {
  readonly lowerBound: number;
  readonly upperBound: number;
}

export type ProfileBounds = Readonly<Record<TelemetryParameter, ParameterBounds>>;

export interface MissionProfile {
  readonly name: string;
  readonly builtIn: boolean;
  readonly bounds: ProfileBounds;
  readonly createdAt: Date;
}

export const UNBOUNDED: ParameterBounds = Object.freeze({
  lowerBound: -Infinity,
  upperBound: Infinity,
});

export function hasFiniteBound(bounds: ParameterBounds): boolean {
  return Number.isFinite(bounds.lowerBound) || Number.isFinite(bounds.upperBound);
}

// ─── Wire form ────────────────────────────────────────────────────────────────
// JSON has no Infinity, so an unchecked side travels as null.

export interface WireParameterBounds {
  lowerBound: number | null;
  upperBound: number | null;
}

export function toWireBounds(bounds: ParameterBounds): WireParameterBounds {
  return {
    lowerBound: Number.isFinite(bounds.lowerBound) ? bounds.lowerBound : null,
    upperBound: Number.isFinite(bounds.upperBound) ? bounds.upperBound : null,
  };
}

export function fromWireBounds(wire: WireParameterBounds): ParameterBounds {
  return {
    lowerBound: wire.lowerBound ?? -Infinity,
    upperBound: wire.upperBound ?? Infinity,
  };
}
