export const REDACTED = '**REDACTED**';

/**
 * Keys whose values identify the device, its owner or its credentials.
 * Matched case-sensitively at any depth.
 */
export const REDACTED_KEYS: ReadonlySet<string> = new Set([
  'password',
  'username',
  'host',
  'ecuHost',
  'ecu_host',
  'baseUrl',
  'ecuId',
  'ecu_id',
  'serialNumber',
  'serial_number',
  'deviceId',
  'clusterId',
]);

/**
 * Deep copy of `value` with every redacted key's value replaced by the
 * REDACTED marker. Absent keys stay absent.
 */
export function redact(
  value: unknown,
  keys: ReadonlySet<string> = REDACTED_KEYS,
): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, keys));
  }
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) continue;
      out[key] = keys.has(key) ? REDACTED : redact(child, keys);
    }
    return out;
  }
  return value;
}
