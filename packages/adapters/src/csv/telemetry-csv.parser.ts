import {
  ParseError,
  TELEMETRY_CSV_HEADER,
  TELEMETRY_PARAMETERS,
} from '@telemetry-analyzer/domain';
import type {
  TelemetryImportPort,
  TelemetryParameter,
  TelemetryRecord,
} from '@telemetry-analyzer/domain';

// DD-MM-YYYY HH:MM
const TIMESTAMP_RE = /^(\d{2})-(\d{2})-(\d{4}) (\d{2}):(\d{2})$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parses `DD-MM-YYYY HH:MM` into a Date whose UTC fields hold the wall clock. */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_RE.exec(text);
  if (!match) return null;
  const [, dd, mm, yyyy, hh, min] = match.map(Number);
  if (
    dd === undefined || mm === undefined || yyyy === undefined ||
    hh === undefined || min === undefined
  ) {
    return null;
  }
  if (hh > 23 || min > 59) return null;
  // setUTCFullYear keeps years 0-99 as written; Date.UTC would map them to 19xx
  const ts = new Date(0);
  ts.setUTCFullYear(yyyy, mm - 1, dd);
  ts.setUTCHours(hh, min, 0, 0);
  // Out-of-range days roll over (31-02 becomes March); reject instead
  if (ts.getUTCFullYear() !== yyyy || ts.getUTCMonth() !== mm - 1 || ts.getUTCDate() !== dd) return null;
  return ts;
}

export function formatTimestamp(ts: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${pad(ts.getUTCDate())}-${pad(ts.getUTCMonth() + 1)}-${pad(ts.getUTCFullYear(), 4)} ` +
    `${pad(ts.getUTCHours())}:${pad(ts.getUTCMinutes())}`
  );
}

function parseNumeric(cell: string, parameter: TelemetryParameter, line: number): number | null {
  if (cell === '' || cell.toLowerCase() === 'nan') return null;
  if (!DECIMAL_RE.test(cell)) {
    throw new ParseError(`${parameter} is not a number: "${cell}"`, line);
  }
  return Number(cell);
}

/**
 * Reads telemetry CSV with the fixed header
 * `timestamp,temperature,pressure,velocity,battery,fuel`.
 *
 * The whole document is rejected on the first malformed line. Blank lines are
 * skipped; an empty or `NaN` numeric cell becomes a missing value.
 */
export class TelemetryCsvParser implements TelemetryImportPort {
  parse(text: string): TelemetryRecord[] {
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

    const headerIdx = lines.findIndex((l) => l.trim() !== '');
    if (headerIdx === -1) throw new ParseError('missing header row', 1);
    this.checkHeader(lines[headerIdx] ?? '', headerIdx + 1);

    const records: TelemetryRecord[] = [];
    for (let i = headerIdx + 1; i < lines.length; i++) {
      const raw = lines[i] ?? '';
      if (raw.trim() === '') continue;
      records.push(this.parseRow(raw, i + 1));
    }
    return records;
  }

  private checkHeader(raw: string, line: number): void {
    const columns = raw.split(',').map((c) => c.trim());
    const expected = TELEMETRY_CSV_HEADER.join(',');
    if (columns.join(',') !== expected) {
      throw new ParseError(`header must be "${expected}", got "${raw.trim()}"`, line);
    }
  }

  private parseRow(raw: string, line: number): TelemetryRecord {
    const cells = raw.split(',').map((c) => c.trim());
    if (cells.length !== TELEMETRY_CSV_HEADER.length) {
      throw new ParseError(
        `expected ${TELEMETRY_CSV_HEADER.length} columns, got ${cells.length}`,
        line,
      );
    }

    const [tsCell = '', ...valueCells] = cells;
    const ts = parseTimestamp(tsCell);
    if (!ts) throw new ParseError(`timestamp must be DD-MM-YYYY HH:MM, got "${tsCell}"`, line);

    const values = TELEMETRY_PARAMETERS.map((p, idx) => parseNumeric(valueCells[idx] ?? '', p, line));
    const [temperature = null, pressure = null, velocity = null, battery = null, fuel = null] = values;
    return { ts, temperature, pressure, velocity, battery, fuel };
  }
}
