/**
 * Device JSON endpoints polled by the coordinator.
 *
 * Required endpoints must succeed (or fall back to a valid cache entry) for a
 * cycle to publish. Optional endpoints may fail on their own; the snapshot
 * then simply lacks the fields they feed.
 */
export const DEVICE_ENDPOINTS = {
  status: { path: '/status.json', required: true },
  ems: { path: '/ems.json', required: true },
  params: { path: '/params.json', required: true },
  schedule: { path: '/schedule.json', required: true },
  mains: { path: '/mains_data.json', required: false },
  otaManifest: { path: '/ota_manifest.json', required: false },
} as const;

export type EndpointKey = keyof typeof DEVICE_ENDPOINTS;

export const ENDPOINT_KEYS: readonly EndpointKey[] = [
  'status',
  'ems',
  'params',
  'schedule',
  'mains',
  'otaManifest',
];

export const CONSOLE_ENDPOINT = '/console.json';

/**
 * Raw JSON bodies keyed by endpoint. An optional endpoint that failed is
 * simply missing from the map.
 */
export type RawDocuments = Partial<Record<EndpointKey, unknown>>;
