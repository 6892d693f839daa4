import { isRepresentableEpochSeconds } from './units';

/**
 * Per-field resolution for the device's two wire formats.
 *
 * The firmware API returns nested documents (ems[0].ems_data.soc_avg in
 * centi-%), while the published OpenAPI description uses flat documents
 * (battery_soc in %). Rather than branching on the format, every logical field
 * lists its candidate sources in priority order. The first candidate that
 * yields a value wins; when none does, the field is left out.
 *
 * Supporting another format means adding candidates to the tables.
 */

export type WireShape = 'nested' | 'flat';

export type PathSegment = string | number;

export interface FieldSource<T> {
  readonly shape: WireShape;
  readonly path: readonly PathSegment[];
  /** Convert the raw value; undefined means "not usable, try the next source" */
  readonly decode: (raw: unknown) => T | undefined;
}

/**
 * One list of sources for every property of R.
 */
export type FieldTable<R> = {
  readonly [K in keyof R]-?: readonly FieldSource<Exclude<R[K], undefined>>[];
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readPath(
  value: unknown,
  path: readonly PathSegment[],
): unknown {
  let current = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

export function resolveField<T>(
  sources: readonly FieldSource<T>[],
  doc: unknown,
): T | undefined {
  for (const source of sources) {
    const raw = readPath(doc, source.path);
    if (raw === undefined || raw === null) continue;
    const decoded = source.decode(raw);
    if (decoded !== undefined) return decoded;
  }
  return undefined;
}

/**
 * Resolve every field of a table against one document. Fields without a
 * usable source are absent from the result rather than set to undefined.
 */
export function resolveRecord<R extends object>(
  table: FieldTable<R>,
  doc: unknown,
): Partial<R> {
  const out: { -readonly [K in keyof R]?: R[K] } = {};
  for (const key in table) {
    const value = resolveField(table[key], doc);
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

// Decoders ---------------------------------------------------------------

export const asNumber = (raw: unknown): number | undefined =>
  typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined;

/** Epoch seconds that fall inside the range a Date can represent */
export const asEpochSeconds = (raw: unknown): number | undefined =>
  typeof raw === 'number' && isRepresentableEpochSeconds(raw) ? raw : undefined;

export const asString = (raw: unknown): string | undefined =>
  typeof raw === 'string' ? raw : undefined;

export const asNonEmptyString = (raw: unknown): string | undefined =>
  typeof raw === 'string' && raw.length > 0 ? raw : undefined;

export const asStringList = (raw: unknown): string[] | undefined =>
  Array.isArray(raw)
    ? raw.filter((item): item is string => typeof item === 'string')
    : undefined;

/** Numeric decoder that applies a unit conversion */
export const scaled =
  (convert: (value: number) => number) =>
  (raw: unknown): number | undefined => {
    const value = asNumber(raw);
    return value === undefined ? undefined : convert(value);
  };

export function nested<T>(
  path: readonly PathSegment[],
  decode: (raw: unknown) => T | undefined,
): FieldSource<T> {
  return { shape: 'nested', path, decode };
}

export function flat<T>(
  path: readonly PathSegment[],
  decode: (raw: unknown) => T | undefined,
): FieldSource<T> {
  return { shape: 'flat', path, decode };
}
