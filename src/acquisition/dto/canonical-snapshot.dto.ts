import type { EndpointKey } from '../interfaces/endpoint.interface';

/**
 * Canonical Snapshot
 *
 * The single normalized representation of everything polled from the device
 * in one cycle. Every numeric value is already in its display unit
 * (%, W, Hz, °C, kWh, days); raw scaled integers never leave the normalizer.
 *
 * Optional properties are omitted when the device did not report them. A
 * missing value is never replaced with 0 or false.
 */
export interface CanonicalSnapshot {
  readonly status: StatusReading;
  /** EMS units in device order; the first entry is the local unit */
  readonly ems: readonly EmsUnitReading[];
  /** Cluster totals reported by a leader */
  readonly aggregated?: EmsUnitReading;
  readonly role: ClusterRole;
  /** Absent on devices without mains measurement */
  readonly mains?: MainsReading;
  readonly schedule: ScheduleState;
  readonly sensors: readonly ExternalSensorReading[];
  readonly params: Readonly<Record<string, ParamValue>>;
  /** User-configured mDNS instance name */
  readonly deviceName?: string;
  readonly otaVersion?: string;
  /** ISO-8601 time the snapshot was assembled */
  readonly fetchedAt: string;
  /** True when any part was served from cache or carried over from a failed cycle */
  readonly stale: boolean;
  /** Endpoints whose data came from the response cache */
  readonly staleEndpoints: readonly EndpointKey[];
  /** Endpoints that could not be refreshed at all (degraded carry-over) */
  readonly unavailable: readonly EndpointKey[];
}

export type ClusterRole = 'leader' | 'follower';

export type ParamValue = string | number | boolean;

export interface StatusReading {
  /** Uptime in days (device reports milliseconds) */
  readonly upTimeDays?: number;
  readonly firmwareVersion?: string;
  readonly wifi?: LinkStatus;
  readonly lte?: LinkStatus;
}

export interface LinkStatus {
  readonly connected?: boolean;
  /** dBm */
  readonly rssi?: number;
  readonly ssid?: string;
  readonly operator?: string;
}

export interface EmsUnitReading {
  readonly ecuId?: string;
  /** Host of a remote unit; empty for the local one */
  readonly ecuHost?: string;
  /** State of charge, % */
  readonly soc?: number;
  /** Inverter power, W */
  readonly power?: number;
  /** Hz */
  readonly frequency?: number;
  /** System temperature, °C */
  readonly temperature?: number;
  /** Wh */
  readonly availableCapacity?: number;
  /** kWh */
  readonly energyProduced?: number;
  /** kWh */
  readonly energyConsumed?: number;
  readonly operatingState?: string;
  readonly batteryState?: string;
  readonly firmwareVersion?: string;
  /** W */
  readonly ratedPower?: number;
  readonly alarms?: readonly string[];
  readonly warnings?: readonly string[];
  readonly infos?: readonly string[];
  readonly alarmCount?: number;
  readonly warningCount?: number;
  readonly infoCount?: number;
  readonly prediction?: EmsPrediction;
}

/**
 * Available power/energy headroom predicted by the EMS. Power in W, energy in Wh.
 */
export interface EmsPrediction {
  readonly availableChargePower?: number;
  readonly availableDischargePower?: number;
  readonly availableChargeEnergy?: number;
  readonly availableDischargeEnergy?: number;
  readonly availableInverterChargePower?: number;
  readonly availableInverterDischargePower?: number;
}

export interface MainsReading {
  /** RMS voltage, V */
  readonly voltage?: number;
  /** Hz */
  readonly frequency?: number;
}

export type ScheduleMode = 'local' | 'remote';

export interface ScheduleState {
  readonly localMode: boolean;
  readonly mode: ScheduleMode;
  readonly scheduleId?: string | number;
  readonly entries: readonly ScheduleEntry[];
}

export interface ScheduleEntry {
  /** Raw control-mode code as reported by the device */
  readonly type: number;
  /** Lookup-table name, or "unknown" for codes outside the table */
  readonly typeName: string;
  /** Epoch seconds */
  readonly from?: number;
  readonly to?: number;
  readonly fromUtc?: string;
  readonly toUtc?: string;
  readonly minSoc?: number;
  readonly maxSoc?: number;
  readonly setpoint?: number;
  readonly maxCharge?: number;
  readonly maxDischarge?: number;
  readonly importLimit?: number;
  readonly exportLimit?: number;
}

export type ExternalSensorKind = 'grid' | 'solar' | 'load';

export interface ExternalSensorReading {
  readonly kind: ExternalSensorKind;
  /** W */
  readonly power?: number;
  /** kWh */
  readonly energyImported?: number;
  /** kWh */
  readonly energyExported?: number;
  readonly rssi?: number;
}
