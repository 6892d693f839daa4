import { z } from 'zod';
import { parseBody } from './control-actions';

/**
 * Device parameters that may be written through PUT /control/params/:name.
 * Values are sent as strings; switches as "true"/"false".
 */
export type WritableParam =
  | { readonly kind: 'number'; readonly min: number; readonly max: number; readonly unit?: string }
  | { readonly kind: 'select'; readonly options: readonly [string, ...string[]] }
  | { readonly kind: 'switch' };

export const WRITABLE_PARAMS: Readonly<Record<string, WritableParam>> = {
  ecu_main_fuse_size_a: { kind: 'number', min: 0, max: 100, unit: 'A' },
  ecu_group_fuse_size_a: { kind: 'number', min: 0, max: 100, unit: 'A' },
  ledstrip_bright_max: { kind: 'number', min: 0, max: 100, unit: '%' },
  ledstrip_bright_min: { kind: 'number', min: 0, max: 100, unit: '%' },
  ledstrip_mode_on_hue: { kind: 'number', min: 0, max: 360 },
  ledstrip_mode_on_saturation: { kind: 'number', min: 0, max: 100, unit: '%' },
  ledstrip_mode: {
    kind: 'select',
    options: ['unset', 'off', 'on', 'soc', 'dem', 'ser'],
  },
  settings_local: { kind: 'switch' },
  ota_enable: { kind: 'switch' },
  ota_enable_esp32: { kind: 'switch' },
  ota_enable_hub_web: { kind: 'switch' },
  ota_enable_bg95_m3: { kind: 'switch' },
};

export function findWritableParam(name: string): WritableParam | undefined {
  return Object.hasOwn(WRITABLE_PARAMS, name) ? WRITABLE_PARAMS[name] : undefined;
}

/**
 * Validate `{ value }` against the parameter's definition and return the
 * string the device expects.
 */
export function renderParamValue(param: WritableParam, body: unknown): string {
  switch (param.kind) {
    case 'number': {
      const { value } = parseBody(
        z.object({ value: z.number().int().min(param.min).max(param.max) }).strict(),
        body,
      );
      return String(value);
    }
    case 'select': {
      const { value } = parseBody(
        z.object({ value: z.enum(param.options) }).strict(),
        body,
      );
      return value;
    }
    case 'switch': {
      const { value } = parseBody(z.object({ value: z.boolean() }).strict(), body);
      return value ? 'true' : 'false';
    }
  }
}
