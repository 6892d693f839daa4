import type { CanonicalSnapshot, ClusterRole } from './dto/canonical-snapshot.dto';

export interface DeviceIdentity {
  readonly deviceId: string;
  readonly name: string;
  readonly firmwareVersion?: string;
  readonly role: ClusterRole;
  readonly clusterId: string;
  readonly clusterName: string;
}

const FALLBACK_DEVICE_ID = 'homevolt';
const FALLBACK_DEVICE_NAME = 'Homevolt Battery';
const HOSTNAME_ID_PATTERN = /homevolt[_-]?([a-zA-Z0-9]+)/i;

/**
 * Derive a stable identity for the device behind `host`. The ECU id of the
 * local unit wins; otherwise an id is taken from a "homevolt-xxxx" hostname.
 */
export function deriveDeviceIdentity(
  snapshot: CanonicalSnapshot | null,
  host: string,
): DeviceIdentity {
  const ecuId = snapshot?.ems[0]?.ecuId;
  const hostMatch = HOSTNAME_ID_PATTERN.exec(host);
  const deviceId = ecuId ?? hostMatch?.[1] ?? FALLBACK_DEVICE_ID;

  let name = FALLBACK_DEVICE_NAME;
  if (snapshot?.deviceName) {
    name = snapshot.deviceName;
  } else if (ecuId ?? hostMatch) {
    name = `Homevolt ${deviceId}`;
  }

  return {
    deviceId,
    name,
    ...(snapshot?.status.firmwareVersion
      ? { firmwareVersion: snapshot.status.firmwareVersion }
      : {}),
    role: snapshot?.role ?? 'follower',
    clusterId: `${deviceId}_cluster`,
    clusterName: `${name} Cluster`,
  };
}
