import type { CanonicalSnapshot } from '../dto/canonical-snapshot.dto';

/**
 * idle -> polling -> published | degraded -> polling -> ...
 * Any state -> reauth_required on an auth failure; unloaded is terminal.
 */
export type PollerState =
  | 'idle'
  | 'polling'
  | 'published'
  | 'degraded'
  | 'reauth_required'
  | 'unloaded';

export type CoordinatorEvent =
  | {
      readonly type: 'snapshot';
      readonly state: 'published' | 'degraded';
      /** null when a cycle degraded before anything was ever published */
      readonly snapshot: CanonicalSnapshot | null;
    }
  | {
      readonly type: 'reauth-required';
      readonly reason: string;
    };

export type CoordinatorListener = (event: CoordinatorEvent) => void;

export type Unsubscribe = () => void;

export const POLL_INTERVAL = Symbol('POLL_INTERVAL');
