export const TELEMETRY_PARAMETERS = [
  'temperature',
  'pressure',
  'velocity',
  'battery',
  'fuel',
] as const;

export type TelemetryParameter = (typeof TELEMETRY_PARAMETERS)[number];

export interface TelemetryParameterInfo {
  readonly label: string;
  readonly unit: string;
  /** Lowest physically meaningful value; -Infinity when unbounded. */
  readonly physicalMin: number;
  /** Highest physically meaningful value; Infinity when unbounded. */
  readonly physicalMax: number;
}

export const PARAMETER_INFO: Readonly<Record<TelemetryParameter, TelemetryParameterInfo>> = {
  temperature: { label: 'Temperature', unit: '°C', physicalMin: -Infinity, physicalMax: Infinity },
  pressure: { label: 'Pressure', unit: 'atm', physicalMin: 0, physicalMax: Infinity },
  velocity: { label: 'Velocity', unit: 'm/s', physicalMin: 0, physicalMax: Infinity },
  battery: { label: 'Battery Level', unit: '%', physicalMin: 0, physicalMax: 100 },
  fuel: { label: 'Fuel Level', unit: '%', physicalMin: 0, physicalMax: 100 },
};

export function isTelemetryParameter(value: string): value is TelemetryParameter {
  return (TELEMETRY_PARAMETERS as readonly string[]).includes(value);
}
