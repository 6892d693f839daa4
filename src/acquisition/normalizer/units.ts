import type { ParamValue, ScheduleMode } from '../dto/canonical-snapshot.dto';

const MS_PER_DAY = 86_400_000;
/** Largest offset from the epoch a Date can hold */
const MAX_DATE_MS = 8.64e15;

export const deciToUnit = (value: number): number => value / 10;
export const centiToUnit = (value: number): number => value / 100;
export const milliToUnit = (value: number): number => value / 1000;
/** Wh -> kWh */
export const whToKwh = (value: number): number => value / 1000;
export const msToDays = (value: number): number => value / MS_PER_DAY;

/**
 * Control-mode codes accepted by the device's scheduler.
 */
export const SCHEDULE_CONTROL_MODES: Readonly<Record<number, string>> = {
  0: 'idle',
  1: 'inverter_charge',
  2: 'inverter_discharge',
  3: 'grid_charge',
  4: 'grid_discharge',
  5: 'grid_charge_discharge',
  6: 'frequency_reserve',
  7: 'solar_charge',
  8: 'solar_charge_discharge',
  9: 'full_solar_export',
};

export const UNKNOWN_CONTROL_MODE = 'unknown';

export function controlModeName(code: number): string {
  return SCHEDULE_CONTROL_MODES[code] ?? UNKNOWN_CONTROL_MODE;
}

export function toScheduleMode(localMode: boolean): ScheduleMode {
  return localMode ? 'local' : 'remote';
}

/**
 * ISO-8601 UTC without milliseconds, e.g. "2025-03-01T10:00:00Z".
 * Used both when rendering schedule commands and when normalizing the
 * device's epoch timestamps, so the two sides compare equal.
 */
export function toUtcIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function isRepresentableEpochSeconds(seconds: number): boolean {
  return Number.isFinite(seconds) && Math.abs(seconds * 1000) <= MAX_DATE_MS;
}

export function epochSecondsToUtcIso(seconds: number): string {
  return toUtcIso(new Date(seconds * 1000));
}

function isScalar(value: unknown): value is ParamValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/**
 * Parameters arrive either as bare scalars or wrapped in a one-element array
 * ([true], [123], ["on"]). Returns the scalar, or undefined when there is
 * nothing scalar to unwrap.
 */
export function unwrapParam(value: unknown): ParamValue | undefined {
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return isScalar(first) ? first : undefined;
  }
  return isScalar(value) ? value : undefined;
}

/** Device booleans show up as true/"true"/1/"1" */
export function isTruthyFlag(value: unknown): boolean {
  return value === true || value === 'true' || value === 1 || value === '1';
}
