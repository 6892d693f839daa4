import { z } from 'zod';
import { InvalidRequestError } from '../acquisition/errors/device-api.error';
import { toUtcIso } from '../acquisition/normalizer/units';

/**
 * Control actions exposed over POST /control/:action.
 *
 * Each action validates its body and renders one or more console commands.
 * Rendering happens before any network call, so an invalid request never
 * reaches the device.
 */
export interface ControlAction {
  readonly name: ControlActionName;
  /** Rejected unless the device is in local mode */
  readonly requiresLocalMode: boolean;
  /** Validate the body and return the console commands, in send order */
  render(body: unknown): string[];
}

const watts = z.number().int().min(0);
const soc = z.number().int().min(0).max(100);
const controlMode = z.number().int().min(0).max(9);
const isoDateTime = z
  .string()
  .datetime({ offset: true })
  .transform((value) => toUtcIso(new Date(value)));

const SetpointBody = z
  .object({
    setpoint: watts.optional(),
    minSoc: soc.optional(),
    maxSoc: soc.optional(),
  })
  .strict();

const ChargeDischargeBody = z
  .object({
    setpoint: watts.optional(),
    chargeSetpoint: watts.optional(),
    dischargeSetpoint: watts.optional(),
    minSoc: soc.optional(),
    maxSoc: soc.optional(),
  })
  .strict();

const GridChargeDischargeBody = ChargeDischargeBody.required({ setpoint: true });

const IdleBody = z.object({ offline: z.boolean().optional() }).strict();

const EmptyBody = z.object({}).strict();

export const ScheduleEntryInput = z
  .object({
    type: controlMode,
    from: isoDateTime.optional(),
    to: isoDateTime.optional(),
    minSoc: soc.optional(),
    maxSoc: soc.optional(),
    setpoint: watts.optional(),
    maxCharge: watts.optional(),
    maxDischarge: watts.optional(),
    importLimit: watts.optional(),
    exportLimit: watts.optional(),
  })
  .strict();

const ScheduleReplaceBody = z
  .object({
    entries: z
      .array(ScheduleEntryInput)
      .min(1, 'Schedule entries list cannot be empty'),
  })
  .strict();

export type ScheduleEntryInput = z.infer<typeof ScheduleEntryInput>;

/** "-s 500" for a set value, nothing otherwise */
function flag(name: string, value: number | string | undefined): string[] {
  return value === undefined ? [] : [`${name} ${value}`];
}

function command(parts: string[]): string {
  return parts.join(' ');
}

export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    throw new InvalidRequestError(`Invalid request: ${details}`);
  }
  return result.data;
}

function defineAction<S extends z.ZodTypeAny>(
  name: ControlActionName,
  schema: S,
  requiresLocalMode: boolean,
  build: (body: z.infer<S>) => string[],
): ControlAction {
  return {
    name,
    requiresLocalMode,
    render: (body) => build(parseBody(schema, body)),
  };
}

function setpointMode(name: ControlActionName, mode: number): ControlAction {
  return defineAction(name, SetpointBody, true, (body: z.infer<typeof SetpointBody>) => [
    command([
      `sched_set ${mode}`,
      ...flag('-s', body.setpoint),
      ...flag('--min', body.minSoc),
      ...flag('--max', body.maxSoc),
    ]),
  ]);
}

function chargeDischargeMode(
  name: ControlActionName,
  mode: number,
  schema: typeof ChargeDischargeBody | typeof GridChargeDischargeBody,
): ControlAction {
  return defineAction(name, schema, true, (body: z.infer<typeof ChargeDischargeBody>) => [
    command([
      `sched_set ${mode}`,
      ...flag('-s', body.setpoint),
      ...flag('-c', body.chargeSetpoint),
      ...flag('-d', body.dischargeSetpoint),
      ...flag('--min', body.minSoc),
      ...flag('--max', body.maxSoc),
    ]),
  ]);
}

/**
 * Arguments of one schedule entry, without the sched_set/sched_add prefix.
 */
export function renderScheduleEntry(entry: ScheduleEntryInput): string {
  return command([
    String(entry.type),
    ...flag('--from', entry.from),
    ...flag('--to', entry.to),
    ...flag('--min', entry.minSoc),
    ...flag('--max', entry.maxSoc),
    ...flag('-s', entry.setpoint),
    ...flag('-c', entry.maxCharge),
    ...flag('-d', entry.maxDischarge),
    ...flag('-l', entry.importLimit),
    ...flag('-x', entry.exportLimit),
  ]);
}

export const CONTROL_ACTION_NAMES = [
  'idle',
  'inverter_charge',
  'inverter_discharge',
  'grid_charge',
  'grid_discharge',
  'grid_charge_discharge',
  'solar_charge',
  'solar_charge_discharge',
  'full_solar_export',
  'schedule_replace',
  'schedule_clear',
  'reboot',
] as const;

export type ControlActionName = (typeof CONTROL_ACTION_NAMES)[number];

export const CONTROL_ACTIONS: Readonly<Record<ControlActionName, ControlAction>> = {
  idle: defineAction('idle', IdleBody, true, (body: z.infer<typeof IdleBody>) => [
    command(['sched_set 0', ...(body.offline ? ['--offline'] : [])]),
  ]),
  inverter_charge: setpointMode('inverter_charge', 1),
  inverter_discharge: setpointMode('inverter_discharge', 2),
  grid_charge: setpointMode('grid_charge', 3),
  grid_discharge: setpointMode('grid_discharge', 4),
  grid_charge_discharge: chargeDischargeMode(
    'grid_charge_discharge',
    5,
    GridChargeDischargeBody,
  ),
  solar_charge: setpointMode('solar_charge', 7),
  solar_charge_discharge: chargeDischargeMode(
    'solar_charge_discharge',
    8,
    ChargeDischargeBody,
  ),
  full_solar_export: setpointMode('full_solar_export', 9),
  schedule_replace: defineAction(
    'schedule_replace',
    ScheduleReplaceBody,
    true,
    (body: z.infer<typeof ScheduleReplaceBody>) =>
      body.entries.map(
        (entry, index) =>
          `${index === 0 ? 'sched_set' : 'sched_add'} ${renderScheduleEntry(entry)}`,
      ),
  ),
  schedule_clear: defineAction('schedule_clear', EmptyBody, true, () => ['sched_clear']),
  reboot: defineAction('reboot', EmptyBody, false, () => ['reset_hard']),
};

export function isControlActionName(name: string): name is ControlActionName {
  return CONTROL_ACTION_NAMES.some((candidate) => candidate === name);
}
