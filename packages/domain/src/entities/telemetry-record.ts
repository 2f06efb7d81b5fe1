import type { TelemetryParameter } from './telemetry-parameter.js';

export type TelemetrySource = 'csv' | 'synthetic';

/**
 * One timestamped snapshot of the monitored parameters.
 *
 * `ts` has no time zone: its UTC fields carry the wall-clock reading as it
 * appeared in the source. A parameter is `null` when the source had no value.
 */
export interface TelemetryRecord {
  readonly ts: Date;
  readonly temperature: number | null; // °C
  readonly pressure: number | null;    // atm
  readonly velocity: number | null;    // m/s
  readonly battery: number | null;     // %
  readonly fuel: number | null;        // %
}

/** Reads a parameter, folding NaN into `null`. */
export function readParameter(record: TelemetryRecord, parameter: TelemetryParameter): number | null {
  const value = record[parameter];
  if (value === null || Number.isNaN(value)) return null;
  return value;
}
