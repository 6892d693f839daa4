import type {
  EmsPrediction,
  EmsUnitReading,
  ExternalSensorKind,
  ExternalSensorReading,
  LinkStatus,
  MainsReading,
  ScheduleEntry,
  StatusReading,
} from '../dto/canonical-snapshot.dto';
import {
  asEpochSeconds,
  asNonEmptyString,
  asNumber,
  asString,
  asStringList,
  FieldTable,
  flat,
  nested,
  scaled,
} from './field-resolution';
import {
  centiToUnit,
  deciToUnit,
  isTruthyFlag,
  milliToUnit,
  msToDays,
  whToKwh,
} from './units';

type EmsUnitFields = Omit<
  EmsUnitReading,
  'alarmCount' | 'warningCount' | 'infoCount' | 'prediction'
>;

/**
 * Applied to one entry of ems[] (nested) or to the whole ems document when it
 * is in the flat format.
 */
export const EMS_UNIT_FIELDS: FieldTable<EmsUnitFields> = {
  ecuId: [
    nested(['ecu_id'], asNonEmptyString),
    nested(['ecu_id'], (raw) => (typeof raw === 'number' ? String(raw) : undefined)),
  ],
  ecuHost: [nested(['ecu_host'], asString)],
  soc: [
    nested(['ems_data', 'soc_avg'], scaled(centiToUnit)),
    nested(['bms_data', 0, 'soc'], asNumber),
    flat(['battery_soc'], asNumber),
  ],
  power: [nested(['ems_data', 'power'], asNumber), flat(['inverter_power'], asNumber)],
  frequency: [
    nested(['ems_data', 'frequency'], scaled(milliToUnit)),
    flat(['grid_frequency'], asNumber),
  ],
  temperature: [
    nested(['ems_data', 'sys_temp'], scaled(deciToUnit)),
    flat(['temperature'], asNumber),
  ],
  availableCapacity: [
    nested(['ems_data', 'avail_cap'], asNumber),
    flat(['available_capacity'], asNumber),
  ],
  energyProduced: [nested(['ems_data', 'energy_produced'], scaled(whToKwh))],
  energyConsumed: [nested(['ems_data', 'energy_consumed'], scaled(whToKwh))],
  operatingState: [nested(['op_state_str'], asString), flat(['ems_state'], asString)],
  batteryState: [nested(['ems_data', 'state_str'], asString)],
  firmwareVersion: [nested(['ems_info', 'fw_version'], asString)],
  ratedPower: [nested(['ems_info', 'rated_power'], asNumber)],
  alarms: [nested(['ems_data', 'alarm_str'], asStringList)],
  warnings: [nested(['ems_data', 'warning_str'], asStringList)],
  infos: [nested(['ems_data', 'info_str'], asStringList)],
};

/** Applied to the unit's ems_prediction block */
export const EMS_PREDICTION_FIELDS: FieldTable<EmsPrediction> = {
  availableChargePower: [nested(['avail_ch_pwr'], asNumber)],
  availableDischargePower: [nested(['avail_di_pwr'], asNumber)],
  availableChargeEnergy: [nested(['avail_ch_energy'], asNumber)],
  availableDischargeEnergy: [nested(['avail_di_energy'], asNumber)],
  availableInverterChargePower: [nested(['avail_inv_ch_pwr'], asNumber)],
  availableInverterDischargePower: [nested(['avail_inv_di_pwr'], asNumber)],
};

export const STATUS_FIELDS: FieldTable<Omit<StatusReading, 'wifi' | 'lte'>> = {
  upTimeDays: [nested(['up_time'], scaled(msToDays))],
  firmwareVersion: [
    nested(['firmware', 'esp'], asString),
    flat(['firmware_version'], asString),
  ],
};

export const WIFI_FIELDS: FieldTable<LinkStatus> = {
  connected: [nested(['connected'], (raw) => isTruthyFlag(raw))],
  rssi: [nested(['rssi'], asNumber)],
  ssid: [nested(['ssid'], asString)],
  operator: [],
};

/** LTE counts as connected once the modem reports an operator */
export const LTE_FIELDS: FieldTable<LinkStatus> = {
  connected: [
    nested(['operator_name'], (raw) =>
      typeof raw === 'string' ? raw.length > 0 : undefined,
    ),
  ],
  rssi: [nested(['rssi'], asNumber)],
  ssid: [],
  operator: [nested(['operator_name'], asNonEmptyString)],
};

export const MAINS_FIELDS: FieldTable<MainsReading> = {
  voltage: [nested(['mains_voltage_rms'], asNumber), flat(['voltage'], asNumber)],
  frequency: [nested(['frequency'], asNumber)],
};

export const SCHEDULE_ENTRY_FIELDS: FieldTable<
  Omit<ScheduleEntry, 'type' | 'typeName' | 'fromUtc' | 'toUtc'>
> = {
  from: [nested(['from'], asEpochSeconds)],
  to: [nested(['to'], asEpochSeconds)],
  minSoc: [
    nested(['params', 'min_soc'], asNumber),
    flat(['min_soc'], asNumber),
  ],
  maxSoc: [
    nested(['params', 'max_soc'], asNumber),
    flat(['max_soc'], asNumber),
  ],
  setpoint: [
    nested(['params', 'setpoint'], asNumber),
    flat(['setpoint'], asNumber),
  ],
  maxCharge: [
    nested(['params', 'max_charge'], asNumber),
    flat(['max_charge'], asNumber),
  ],
  maxDischarge: [
    nested(['params', 'max_discharge'], asNumber),
    flat(['max_discharge'], asNumber),
  ],
  importLimit: [
    nested(['params', 'import_limit'], asNumber),
    flat(['import_limit'], asNumber),
  ],
  exportLimit: [
    nested(['params', 'export_limit'], asNumber),
    flat(['export_limit'], asNumber),
  ],
};

/** Applied to one entry of the ems document's sensors[] list */
export const SENSOR_FIELDS: FieldTable<Omit<ExternalSensorReading, 'kind'>> = {
  power: [nested(['total_power'], asNumber)],
  energyImported: [nested(['energy_imported'], asNumber)],
  energyExported: [nested(['energy_exported'], asNumber)],
  rssi: [nested(['rssi'], asNumber)],
};

export const SENSOR_KINDS: readonly ExternalSensorKind[] = ['grid', 'solar', 'load'];

export function isSensorKind(value: unknown): value is ExternalSensorKind {
  return SENSOR_KINDS.some((kind) => kind === value);
}

/** Flat-format sensor power, e.g. grid_power at the top of the ems document */
export function flatSensorPowerField(kind: ExternalSensorKind): string {
  return `${kind}_power`;
}
