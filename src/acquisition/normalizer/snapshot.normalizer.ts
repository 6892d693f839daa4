import { Injectable, Logger } from '@nestjs/common';
import type {
  CanonicalSnapshot,
  EmsUnitReading,
  ExternalSensorReading,
  MainsReading,
  ParamValue,
  ScheduleEntry,
  ScheduleState,
  StatusReading,
} from '../dto/canonical-snapshot.dto';
import { MalformedDocumentError } from '../errors/device-api.error';
import {
  DEVICE_ENDPOINTS,
  EndpointKey,
  RawDocuments,
} from '../interfaces/endpoint.interface';
import { deepFreeze } from './deep-freeze';
import {
  EmsDocument,
  EmsDocumentSchema,
  ParamsDocumentSchema,
  parseDocument,
  ScheduleDocument,
  ScheduleDocumentSchema,
  StatusDocumentSchema,
} from './document-schemas';
import { asNonEmptyString, isRecord, readPath, resolveRecord } from './field-resolution';
import {
  EMS_PREDICTION_FIELDS,
  EMS_UNIT_FIELDS,
  flatSensorPowerField,
  isSensorKind,
  LTE_FIELDS,
  MAINS_FIELDS,
  SCHEDULE_ENTRY_FIELDS,
  SENSOR_FIELDS,
  SENSOR_KINDS,
  STATUS_FIELDS,
  WIFI_FIELDS,
} from './field-tables';
import {
  controlModeName,
  epochSecondsToUtcIso,
  toScheduleMode,
  unwrapParam,
} from './units';

export interface NormalizeMeta {
  /** ISO-8601 time the cycle finished fetching */
  fetchedAt: string;
  /** Endpoints whose documents came from the response cache */
  staleEndpoints: readonly EndpointKey[];
}

const REQUIRED_DOCUMENTS: readonly EndpointKey[] = [
  'status',
  'ems',
  'params',
  'schedule',
];

const DEVICE_NAME_PARAM = 'ecu_mdns_instance_name';

/**
 * Snapshot Normalizer
 *
 * Turns the raw JSON documents of one poll cycle into a CanonicalSnapshot.
 * Field lookups go through the resolution tables in field-tables.ts, which
 * cover both the firmware's nested format and the flat OpenAPI format.
 *
 * normalize() is pure: it reads nothing but its arguments, so the same input
 * always produces a structurally equal snapshot. The result is deep-frozen.
 */
@Injectable()
export class SnapshotNormalizer {
  private readonly logger = new Logger(SnapshotNormalizer.name);

  normalize(raw: RawDocuments, meta: NormalizeMeta): CanonicalSnapshot {
    for (const key of REQUIRED_DOCUMENTS) {
      if (raw[key] === undefined || raw[key] === null) {
        throw new MalformedDocumentError(
          DEVICE_ENDPOINTS[key].path,
          '$',
          'document missing',
        );
      }
    }

    const statusDoc = parseDocument('status', StatusDocumentSchema, raw.status);
    const emsDoc = parseDocument('ems', EmsDocumentSchema, raw.ems);
    const paramsDoc = parseDocument('params', ParamsDocumentSchema, raw.params);
    const scheduleDoc = parseDocument(
      'schedule',
      ScheduleDocumentSchema,
      raw.schedule,
    );

    const ems = normalizeEmsUnits(emsDoc);
    const params = normalizeParams(paramsDoc);
    const mains = normalizeMains(raw.mains);
    const deviceName = asNonEmptyString(params[DEVICE_NAME_PARAM]);
    const otaVersion = asNonEmptyString(readPath(raw.otaManifest, ['version']));
    const aggregated = isRecord(emsDoc.aggregated)
      ? normalizeEmsUnit(emsDoc.aggregated)
      : undefined;

    this.logger.debug(
      `Normalized ${ems.length} EMS unit(s), ${Object.keys(params).length} params`,
    );

    const snapshot: CanonicalSnapshot = {
      status: normalizeStatus(statusDoc),
      ems,
      ...(aggregated ? { aggregated } : {}),
      role: ems.length > 1 ? 'leader' : 'follower',
      ...(mains ? { mains } : {}),
      schedule: normalizeSchedule(scheduleDoc),
      sensors: normalizeSensors(emsDoc),
      params,
      ...(deviceName !== undefined ? { deviceName } : {}),
      ...(otaVersion !== undefined ? { otaVersion } : {}),
      fetchedAt: meta.fetchedAt,
      stale: meta.staleEndpoints.length > 0,
      staleEndpoints: [...meta.staleEndpoints],
      unavailable: [],
    };
    return deepFreeze(snapshot);
  }
}

function normalizeStatus(doc: unknown): StatusReading {
  const wifi = isRecord(readPath(doc, ['wifi_status']))
    ? resolveRecord(WIFI_FIELDS, readPath(doc, ['wifi_status']))
    : undefined;
  const lte = isRecord(readPath(doc, ['lte_status']))
    ? resolveRecord(LTE_FIELDS, readPath(doc, ['lte_status']))
    : undefined;
  return {
    ...resolveRecord(STATUS_FIELDS, doc),
    ...(wifi ? { wifi } : {}),
    ...(lte ? { lte } : {}),
  };
}

/**
 * Nested documents list their units under ems[]. A flat document describes
 * a single unit at its top level.
 */
function normalizeEmsUnits(doc: EmsDocument): EmsUnitReading[] {
  if (Array.isArray(doc.ems)) {
    return doc.ems.map((unit) => normalizeEmsUnit(unit));
  }
  return [normalizeEmsUnit(doc)];
}

function normalizeEmsUnit(unit: unknown): EmsUnitReading {
  const fields = resolveRecord(EMS_UNIT_FIELDS, unit);
  const predictionDoc = readPath(unit, ['ems_prediction']);
  const prediction = isRecord(predictionDoc)
    ? resolveRecord(EMS_PREDICTION_FIELDS, predictionDoc)
    : {};

  return {
    ...fields,
    ...(fields.alarms ? { alarmCount: fields.alarms.length } : {}),
    ...(fields.warnings ? { warningCount: fields.warnings.length } : {}),
    ...(fields.infos ? { infoCount: fields.infos.length } : {}),
    ...(Object.keys(prediction).length > 0 ? { prediction } : {}),
  };
}

function normalizeMains(doc: unknown): MainsReading | undefined {
  if (!isRecord(doc)) {
    return undefined;
  }
  const mains = resolveRecord(MAINS_FIELDS, doc);
  return Object.keys(mains).length > 0 ? mains : undefined;
}

/**
 * External sensors come from the ems document's sensors[] list (first entry
 * per kind), or from top-level grid_power / solar_power / load_power in the
 * flat format. Kinds the device does not report produce no entry.
 */
function normalizeSensors(doc: EmsDocument): ExternalSensorReading[] {
  if (Array.isArray(doc.sensors)) {
    const readings: ExternalSensorReading[] = [];
    for (const entry of doc.sensors) {
      const kind = readPath(entry, ['type']);
      if (!isSensorKind(kind) || readings.some((r) => r.kind === kind)) {
        continue;
      }
      readings.push({ kind, ...resolveRecord(SENSOR_FIELDS, entry) });
    }
    return readings;
  }

  const readings: ExternalSensorReading[] = [];
  for (const kind of SENSOR_KINDS) {
    const power = readPath(doc, [flatSensorPowerField(kind)]);
    if (typeof power === 'number' && Number.isFinite(power)) {
      readings.push({ kind, power });
    }
  }
  return readings;
}

function normalizeParams(doc: unknown): Record<string, ParamValue> {
  const params: Record<string, ParamValue> = {};
  if (Array.isArray(doc)) {
    for (const entry of doc) {
      const name = readPath(entry, ['name']);
      const value = unwrapParam(readPath(entry, ['value']));
      if (typeof name === 'string' && value !== undefined) {
        params[name] = value;
      }
    }
  } else if (isRecord(doc)) {
    for (const [name, rawValue] of Object.entries(doc)) {
      const value = unwrapParam(rawValue);
      if (value !== undefined) {
        params[name] = value;
      }
    }
  }
  return params;
}

function normalizeSchedule(doc: ScheduleDocument): ScheduleState {
  const localMode = doc.local_mode === true;
  const entries = (doc.schedule ?? []).map((entry) =>
    normalizeScheduleEntry(entry),
  );
  return {
    localMode,
    mode: toScheduleMode(localMode),
    ...(doc.schedule_id !== undefined && doc.schedule_id !== null
      ? { scheduleId: doc.schedule_id }
      : {}),
    entries,
  };
}

function normalizeScheduleEntry(entry: { type: number }): ScheduleEntry {
  const fields = resolveRecord(SCHEDULE_ENTRY_FIELDS, entry);
  return {
    type: entry.type,
    typeName: controlModeName(entry.type),
    ...fields,
    ...(fields.from !== undefined
      ? { fromUtc: epochSecondsToUtcIso(fields.from) }
      : {}),
    ...(fields.to !== undefined ? { toUtc: epochSecondsToUtcIso(fields.to) } : {}),
  };
}
