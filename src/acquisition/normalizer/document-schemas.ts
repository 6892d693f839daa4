import { z } from 'zod';
import { MalformedDocumentError } from '../errors/device-api.error';
import { DEVICE_ENDPOINTS, EndpointKey } from '../interfaces/endpoint.interface';

/**
 * Structure checks for the required documents.
 *
 * Only the skeleton the normalizer walks is checked here. Leaf values are
 * decoded leniently by the field tables, so an unexpected leaf type drops
 * that one field instead of the whole document.
 */

const looseObject = z.object({}).passthrough();

export const StatusDocumentSchema = z
  .object({
    up_time: z.number().nullish(),
    firmware: looseObject.nullish(),
    wifi_status: looseObject.nullish(),
    lte_status: looseObject.nullish(),
  })
  .passthrough();

const EmsUnitSchema = z
  .object({
    ems_data: looseObject.nullish(),
    ems_info: looseObject.nullish(),
    ems_prediction: looseObject.nullish(),
    bms_data: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export const EmsDocumentSchema = z
  .object({
    ems: z.array(EmsUnitSchema).nullish(),
    aggregated: EmsUnitSchema.nullish(),
    sensors: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const ParamEntrySchema = z
  .object({
    name: z.string(),
    value: z.unknown(),
  })
  .passthrough();

/** Nested list of {name, value} or a flat name -> value map */
export const ParamsDocumentSchema = z.union([
  z.array(ParamEntrySchema),
  z.record(z.string(), z.unknown()),
]);

const ScheduleEntrySchema = z
  .object({
    type: z.number().int(),
    from: z.number().nullish(),
    to: z.number().nullish(),
  })
  .passthrough();

export const ScheduleDocumentSchema = z
  .object({
    local_mode: z.boolean().nullish(),
    schedule_id: z.union([z.string(), z.number()]).nullish(),
    schedule: z.array(ScheduleEntrySchema).nullish(),
  })
  .passthrough();

export type EmsDocument = z.infer<typeof EmsDocumentSchema>;
export type ScheduleDocument = z.infer<typeof ScheduleDocumentSchema>;

/**
 * Parse a required document, translating the first zod issue into a
 * MalformedDocumentError that names the endpoint and the offending path.
 */
export function parseDocument<S extends z.ZodTypeAny>(
  endpoint: EndpointKey,
  schema: S,
  doc: unknown,
): z.infer<S> {
  const result = schema.safeParse(doc);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const fieldPath = issue && issue.path.length > 0 ? issue.path.join('.') : '$';
  throw new MalformedDocumentError(
    DEVICE_ENDPOINTS[endpoint].path,
    fieldPath,
    issue ? issue.message : 'invalid document',
  );
}
