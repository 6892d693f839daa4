// Re-export public API
export { AcquisitionModule } from './acquisition.module';
export { PollCoordinatorService } from './coordinator/poll-coordinator.service';
export type {
  CoordinatorEvent,
  CoordinatorListener,
  PollerState,
} from './coordinator/coordinator.types';
export { SnapshotNormalizer } from './normalizer/snapshot.normalizer';
export type { CanonicalSnapshot } from './dto/canonical-snapshot.dto';
export * from './errors/device-api.error';
