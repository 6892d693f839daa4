import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { DeviceCredentials, POLL_INTERVAL_MS } from '../../config/device.config';
import { DeviceHttpClient } from '../client/device-http.client';
import { FetchResult, RetryingDeviceClient } from '../client/retrying-device.client';
import { CLOCK, Clock, systemClock } from '../clock';
import type { CanonicalSnapshot } from '../dto/canonical-snapshot.dto';
import { AuthError, MalformedDocumentError } from '../errors/device-api.error';
import {
  DEVICE_ENDPOINTS,
  ENDPOINT_KEYS,
  EndpointKey,
  RawDocuments,
} from '../interfaces/endpoint.interface';
import { deepFreeze } from '../normalizer/deep-freeze';
import { SnapshotNormalizer } from '../normalizer/snapshot.normalizer';
import {
  CoordinatorEvent,
  CoordinatorListener,
  POLL_INTERVAL,
  PollerState,
  Unsubscribe,
} from './coordinator.types';

interface CycleOutcome {
  readonly raw: RawDocuments;
  readonly staleEndpoints: EndpointKey[];
  readonly failedRequired: EndpointKey[];
  readonly authError?: AuthError;
}

/**
 * Poll Coordinator
 *
 * Owns the device's poll loop and the one current snapshot.
 *
 * - Ticks every 10 s, first cycle on start. A tick that arrives while a cycle
 *   is in flight is dropped; refresh() joins the in-flight cycle.
 * - All endpoints of a cycle are fetched concurrently through the retrying
 *   client. Required endpoints must succeed (fresh or cached) to publish.
 * - A failed required endpoint or a malformed document degrades the cycle:
 *   the previous snapshot is re-published as a stale copy.
 * - An auth failure cancels the rest of the cycle at once and pauses polling
 *   until reauthenticate() succeeds.
 * - Any other failure while normalizing degrades the cycle.
 * - Teardown aborts the cycle, closes the HTTP client and drops listeners.
 *   Results that arrive afterwards are discarded.
 */
@Injectable()
export class PollCoordinatorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PollCoordinatorService.name);
  private readonly listeners = new Set<CoordinatorListener>();
  private readonly clock: Clock;
  private readonly intervalMs: number;

  private state: PollerState = 'idle';
  private snapshot: CanonicalSnapshot | null = null;
  private lastSuccessAt: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private cycleAbort: AbortController | null = null;

  constructor(
    private readonly client: RetryingDeviceClient,
    private readonly http: DeviceHttpClient,
    private readonly normalizer: SnapshotNormalizer,
    @Optional() @Inject(CLOCK) clock?: Clock,
    @Optional() @Inject(POLL_INTERVAL) intervalMs?: number,
  ) {
    this.clock = clock ?? systemClock;
    this.intervalMs = intervalMs ?? POLL_INTERVAL_MS;
  }

  onModuleInit(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.shutdown();
  }

  start(): void {
    if (this.timer || this.state === 'unloaded') {
      return;
    }
    this.logger.log(
      `Polling ${this.http.baseUrl} every ${this.intervalMs / 1000}s`,
    );
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.tick();
  }

  /**
   * Timer callback. Starts a cycle unless one is running or polling is
   * paused.
   */
  tick(): void {
    if (this.state === 'unloaded' || this.state === 'reauth_required') {
      return;
    }
    if (this.inFlight) {
      this.logger.debug('Cycle still in flight, dropping tick');
      return;
    }
    this.beginCycle().catch((error: unknown) => {
      this.logger.error(
        `Poll cycle failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }

  /**
   * Run a cycle now, or wait for the one in flight, and return the current
   * snapshot afterwards.
   */
  async refresh(): Promise<CanonicalSnapshot | null> {
    if (this.state !== 'unloaded' && this.state !== 'reauth_required') {
      await (this.inFlight ?? this.beginCycle());
    }
    return this.snapshot;
  }

  getSnapshot(): CanonicalSnapshot | null {
    return this.snapshot;
  }

  getState(): PollerState {
    return this.state;
  }

  getLastSuccessAt(): string | null {
    return this.lastSuccessAt;
  }

  subscribe(listener: CoordinatorListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Validate new credentials with a single probe and resume polling.
   * Throws (and stays paused) when the device still rejects them.
   */
  async reauthenticate(credentials: DeviceCredentials): Promise<CanonicalSnapshot | null> {
    if (this.state === 'unloaded') {
      return this.snapshot;
    }
    this.http.useCredentials(credentials);
    await this.client.probe(DEVICE_ENDPOINTS.status.path);
    this.logger.log('Credentials accepted, resuming polling');
    if (this.state === 'reauth_required') {
      this.state = 'idle';
    }
    return this.refresh();
  }

  shutdown(): void {
    if (this.state === 'unloaded') {
      return;
    }
    this.state = 'unloaded';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.cycleAbort?.abort();
    this.http.close();
    this.listeners.clear();
    this.logger.log('Coordinator unloaded');
  }

  private beginCycle(): Promise<void> {
    const cycle = this.runCycle().finally(() => {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runCycle(): Promise<void> {
    const controller = new AbortController();
    this.cycleAbort = controller;
    this.state = 'polling';

    const outcome = await this.fetchAll(controller);
    if (this.isUnloaded()) {
      this.logger.debug('Discarding results of a cancelled cycle');
      return;
    }

    if (outcome.authError) {
      this.enterReauth(outcome.authError);
      return;
    }

    if (outcome.failedRequired.length > 0) {
      this.degrade(outcome.failedRequired);
      return;
    }

    const fetchedAt = new Date(this.clock.now()).toISOString();
    let snapshot: CanonicalSnapshot;
    try {
      snapshot = this.normalizer.normalize(outcome.raw, {
        fetchedAt,
        staleEndpoints: outcome.staleEndpoints,
      });
    } catch (error) {
      if (error instanceof MalformedDocumentError) {
        this.logger.warn(error.message);
        this.degrade([endpointKeyForPath(error.endpoint)]);
        return;
      }
      this.logger.error(
        `Normalization failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.degrade(REQUIRED_ENDPOINT_KEYS);
      return;
    }

    this.snapshot = snapshot;
    this.lastSuccessAt = fetchedAt;
    this.state = 'published';
    if (snapshot.stale) {
      this.logger.debug(
        `Published snapshot with cached ${snapshot.staleEndpoints.join(', ')}`,
      );
    }
    this.emit({ type: 'snapshot', state: 'published', snapshot });
  }

  /**
   * Fetch every endpoint concurrently. The first auth failure aborts the
   * rest of the cycle, including retries waiting on backoff.
   */
  private async fetchAll(controller: AbortController): Promise<CycleOutcome> {
    const { signal } = controller;
    const settled = await Promise.allSettled(
      ENDPOINT_KEYS.map((key) =>
        this.client
          .fetchWithRetry(DEVICE_ENDPOINTS[key].path, { signal })
          .catch((error: unknown) => {
            if (error instanceof AuthError && !signal.aborted) {
              controller.abort(error);
            }
            throw error;
          }),
      ),
    );

    const raw: RawDocuments = {};
    const staleEndpoints: EndpointKey[] = [];
    const failedRequired: EndpointKey[] = [];

    const authError = firstAuthError(settled);
    if (authError) {
      return { raw, staleEndpoints, failedRequired, authError };
    }

    for (const [index, key] of ENDPOINT_KEYS.entries()) {
      const result: PromiseSettledResult<FetchResult> = settled[index];
      if (result.status === 'fulfilled') {
        raw[key] = result.value.data;
        if (result.value.source === 'cache') {
          staleEndpoints.push(key);
        }
        continue;
      }

      const reason: unknown = result.reason;
      if (DEVICE_ENDPOINTS[key].required) {
        failedRequired.push(key);
        this.logger.warn(
          `Required endpoint ${key} failed: ${reason instanceof Error ? reason.message : String(reason)}`,
        );
      } else {
        this.logger.debug(`Optional endpoint ${key} unavailable`);
      }
    }

    return { raw, staleEndpoints, failedRequired };
  }

  private degrade(unavailable: EndpointKey[]): void {
    const previous = this.snapshot;
    this.snapshot = previous
      ? deepFreeze({ ...previous, stale: true, unavailable: [...unavailable] })
      : null;
    this.state = 'degraded';
    this.logger.warn(
      `Cycle degraded (${unavailable.join(', ')}); ${previous ? 'serving last snapshot as stale' : 'no snapshot yet'}`,
    );
    this.emit({ type: 'snapshot', state: 'degraded', snapshot: this.snapshot });
  }

  private enterReauth(error: AuthError): void {
    this.state = 'reauth_required';
    this.logger.error(`Authentication failed, polling paused: ${error.message}`);
    this.emit({ type: 'reauth-required', reason: error.message });
  }

  private emit(event: CoordinatorEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(
          `Snapshot listener threw: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }

  // read through a method so the 'polling' assignment does not narrow it
  private isUnloaded(): boolean {
    return this.state === 'unloaded';
  }
}

const REQUIRED_ENDPOINT_KEYS: EndpointKey[] = ENDPOINT_KEYS.filter(
  (key) => DEVICE_ENDPOINTS[key].required,
);

function firstAuthError(
  settled: PromiseSettledResult<FetchResult>[],
): AuthError | undefined {
  for (const result of settled) {
    if (result.status === 'rejected' && result.reason instanceof AuthError) {
      return result.reason;
    }
  }
  return undefined;
}

function endpointKeyForPath(path: string | undefined): EndpointKey {
  return ENDPOINT_KEYS.find((key) => DEVICE_ENDPOINTS[key].path === path) ?? 'status';
}
