import {
  ConnectionError,
  StorageError,
  ValidationError,
  ensureTidesyncError,
  parseRecord,
  type FieldValidationError,
  type RecordStore,
  type SyncRecord,
  type TidesyncError,
} from '@tidesync/core';
import {
  BehaviorSubject,
  Subject,
  Subscription,
  defer,
  distinctUntilChanged,
  firstValueFrom,
  map,
  takeUntil,
  throwError,
  timeout,
  type Observable,
} from 'rxjs';
import type { CloudClient, UploadResponse } from './cloud/types.js';
import { ConflictResolver, recordsEqual, type ConflictPolicy } from './conflict.js';
import { errorMessage, resolveLogger, type Logger, type LoggerOptions } from './logger.js';
import {
  resolvePowerTiers,
  tuneForPower,
  type PowerState,
  type PowerStateSource,
  type PowerTiers,
  type PowerTuning,
  type SyncProfile,
  type SyncTuning,
} from './power-policy.js';
import { ReachabilityMonitor, type ReachabilitySource } from './reachability.js';
import { PeriodicScheduler } from './scheduler.js';

/**
 * Sync status. A cycle moves the engine from `idle` to `syncing` and always
 * back to `idle`, whatever its network calls did.
 */
export type SyncStatus = 'idle' | 'syncing';

/**
 * Summary of one sync cycle. Only the latest one is kept.
 */
export interface SyncResult {
  /** Records the remote authority confirmed */
  uploaded: number;
  /** Remote records received */
  downloaded: number;
  /** Remote records that replaced a differing local record */
  conflicts: number;
  /** Unix ms the cycle started */
  startedAt: number;
  /** Unix ms the cycle finished */
  completedAt: number;
  /** Why the upload leg failed, if it did */
  uploadError?: TidesyncError;
  /** Why the download leg failed, if it did */
  downloadError?: TidesyncError;
}

/**
 * Externally observable engine state
 */
export interface SyncEngineState {
  status: SyncStatus;
  /** Unix ms of the last completed cycle */
  lastSync: number | null;
  lastResult: SyncResult | null;
}

/**
 * Sync engine configuration
 */
export interface SyncEngineConfig {
  /** Local record store */
  store: RecordStore;
  /** Client for the remote authority */
  cloud: CloudClient;
  /** Conflict resolution policy */
  conflictPolicy?: ConflictPolicy;
  /** Records per upload batch under the default power profile */
  batchSize?: number;
  /** Delay between scheduled cycles (ms) under the default power profile */
  baseIntervalMs?: number;
  /** Bound on each network leg of a cycle (ms, 0 to disable) */
  cycleTimeoutMs?: number;
  /** Re-arm a timer after every cycle while started */
  autoSchedule?: boolean;
  /** Network path updates; a transition to usable triggers a cycle */
  reachability?: ReachabilitySource;
  /** Quiet period applied to reachability updates (ms) */
  reachabilityDebounceMs?: number;
  /** Device power/thermal updates */
  power?: PowerStateSource;
  /** Overrides for the low-power and thermal-backoff tiers */
  powerTiers?: Partial<Record<SyncProfile, Partial<SyncTuning>>>;
  /** Logger options for structured logging */
  logger?: LoggerOptions | Logger | false;
  /** Clock (Unix ms) */
  now?: () => number;
}

type ResolvedConfig = Required<
  Pick<SyncEngineConfig, 'conflictPolicy' | 'cycleTimeoutMs' | 'autoSchedule' | 'reachabilityDebounceMs' | 'now'>
>;

type RemoteLeg = 'upload' | 'download';

/**
 * Offline-first sync engine.
 *
 * Drains pending records to the remote authority, pulls remote deltas and
 * merges them through the conflict resolver. Every trigger (the periodic
 * timer, reachability transitions, explicit calls) funnels into
 * {@link SyncEngine.syncNow}, and at most one cycle runs at a time.
 *
 * Network failures never escape: they leave records pending, show up in the
 * cycle's {@link SyncResult} and get retried by the next cycle.
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({
 *   store: createMemoryRecordStore(),
 *   cloud: createHttpCloudClient({ serverUrl: 'https://sync.example.com' }),
 *   reachability: createManualReachabilitySource(),
 * });
 *
 * engine.getState().subscribe((state) => render(state));
 * engine.start();
 *
 * await engine.enqueue({ id: 'r1', version: 1, updatedAt: Date.now(), payload: { k: 'v' } });
 * engine.syncNow();
 * ```
 */
export class SyncEngine {
  private readonly store: RecordStore;
  private readonly cloud: CloudClient;
  private readonly config: ResolvedConfig;
  private readonly tiers: PowerTiers;
  private readonly resolver: ConflictResolver;
  private readonly logger: Logger;
  private readonly scheduler: PeriodicScheduler;
  private readonly reachability: ReachabilityMonitor | null;
  private readonly power: PowerStateSource | null;

  private readonly state$ = new BehaviorSubject<SyncEngineState>({
    status: 'idle',
    lastSync: null,
    lastResult: null,
  });
  private readonly results$ = new Subject<SyncResult>();
  private readonly tuning$: BehaviorSubject<PowerTuning>;
  private readonly destroy$ = new Subject<void>();

  private subscriptions = new Subscription();
  private inFlight: Promise<SyncResult> | null = null;
  private watermark: number | null = null;
  private running = false;
  private destroyed = false;

  constructor(config: SyncEngineConfig) {
    this.store = config.store;
    this.cloud = config.cloud;
    this.config = {
      conflictPolicy: config.conflictPolicy ?? 'highest-version-wins',
      cycleTimeoutMs: config.cycleTimeoutMs ?? 30_000,
      autoSchedule: config.autoSchedule ?? true,
      reachabilityDebounceMs: config.reachabilityDebounceMs ?? 0,
      now: config.now ?? Date.now,
    };
    validateTimings(this.config);

    this.tiers = resolvePowerTiers({
      ...config.powerTiers,
      default: {
        ...config.powerTiers?.default,
        ...(config.batchSize !== undefined && { batchSize: config.batchSize }),
        ...(config.baseIntervalMs !== undefined && { baseIntervalMs: config.baseIntervalMs }),
      },
    });
    this.tuning$ = new BehaviorSubject<PowerTuning>({ profile: 'default', ...this.tiers.default });

    this.logger = resolveLogger(config.logger, 'SyncEngine');
    this.resolver = new ConflictResolver(this.config.conflictPolicy);
    this.scheduler = new PeriodicScheduler(() => this.syncNow(), this.tiers.default.baseIntervalMs);
    this.reachability = config.reachability
      ? new ReachabilityMonitor(config.reachability, {
          debounceMs: this.config.reachabilityDebounceMs,
        })
      : null;
    this.power = config.power ?? null;

    this.logger.debug('SyncEngine initialized', {
      conflictPolicy: this.config.conflictPolicy,
      batchSize: this.batchSize,
      baseIntervalMs: this.baseInterval,
    });
  }

  /**
   * Subscribe to reachability and power updates, run a first cycle and keep
   * the periodic timer armed until {@link SyncEngine.stop}.
   */
  start(): void {
    if (this.destroyed) return;
    if (this.running) {
      this.logger.debug('Start called but already running');
      return;
    }

    this.running = true;
    this.logger.info('Starting sync engine');

    if (this.power) {
      this.subscriptions.add(
        this.power.observe().subscribe({
          next: (state) => this.applyPowerState(state),
          error: (error: unknown) =>
            this.logger.warn('Power state source failed', { error: errorMessage(error) }),
        })
      );
    }

    if (this.reachability) {
      this.subscriptions.add(
        this.reachability.transitions().subscribe({
          next: (transition) => {
            this.logger.debug('Network path satisfied', { previous: transition.previous });
            this.syncNow();
          },
          error: (error: unknown) =>
            this.logger.warn('Reachability source failed', { error: errorMessage(error) }),
        })
      );
    }

    this.syncNow();
  }

  /**
   * Stop triggering cycles. A cycle already running completes.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.scheduler.cancel();
    this.subscriptions.unsubscribe();
    this.subscriptions = new Subscription();
    this.logger.info('Sync engine stopped');
  }

  /**
   * Validate a record and write it locally, marking it pending.
   *
   * The version must be higher than the stored version of the same id. The
   * write is compare-and-set against the version read, so a write landing
   * in between makes the enqueue reject instead of being overwritten.
   *
   * @throws ValidationError (TIDE_V100) synchronously for malformed records
   */
  enqueue(record: SyncRecord): Promise<void> {
    const valid = parseRecord(record);
    return this.writeLocal(valid);
  }

  /**
   * Request an immediate cycle. Returns at once; a no-op while a cycle runs.
   */
  syncNow(): void {
    if (this.destroyed) return;
    if (this.isSyncing) {
      this.logger.debug('Sync requested but a cycle is already running');
      return;
    }
    this.sync().catch((error: unknown) => {
      this.logger.error('Sync cycle failed unexpectedly', ensureTidesyncError(error));
    });
  }

  /**
   * Run a cycle, or join the one already running, and resolve with its result.
   * Rejects with a StorageError (TIDE_S300) once the engine is destroyed.
   */
  sync(): Promise<SyncResult> {
    if (this.destroyed) {
      return Promise.reject(
        new StorageError('TIDE_S300', 'Sync engine has been destroyed', { operation: 'sync' })
      );
    }
    if (this.inFlight) return this.inFlight;

    const cycle = this.runCycle();
    if (this.isSyncing) {
      this.inFlight = cycle;
    }
    return cycle;
  }

  /**
   * Retune batch size and interval for the next cycle from a power state.
   * A running cycle is not interrupted; an armed timer is re-armed.
   */
  applyPowerState(state: PowerState): void {
    const next = tuneForPower(state, this.tiers);
    const current = this.tuning$.getValue();
    if (
      next.profile === current.profile &&
      next.batchSize === current.batchSize &&
      next.baseIntervalMs === current.baseIntervalMs
    ) {
      return;
    }

    this.tuning$.next(next);
    this.scheduler.setInterval(next.baseIntervalMs);
    this.logger.info('Sync tuning changed', {
      profile: next.profile,
      batchSize: next.batchSize,
      baseIntervalMs: next.baseIntervalMs,
      lowPowerMode: state.lowPowerMode,
      thermalState: state.thermalState,
    });
  }

  get isSyncing(): boolean {
    return this.state$.getValue().status === 'syncing';
  }

  get lastSync(): number | null {
    return this.state$.getValue().lastSync;
  }

  get lastResult(): SyncResult | null {
    return this.state$.getValue().lastResult;
  }

  /**
   * Watermark sent as `since` on the next download
   */
  get since(): number | null {
    return this.watermark;
  }

  get batchSize(): number {
    return this.tuning$.getValue().batchSize;
  }

  /**
   * Delay between scheduled cycles in ms
   */
  get baseInterval(): number {
    return this.tuning$.getValue().baseIntervalMs;
  }

  get profile(): SyncProfile {
    return this.tuning$.getValue().profile;
  }

  /**
   * Whether the periodic timer is armed
   */
  get isScheduled(): boolean {
    return this.scheduler.isArmed;
  }

  getState(): Observable<SyncEngineState> {
    return this.state$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getStatus(): Observable<SyncStatus> {
    return this.state$.pipe(
      map((state) => state.status),
      distinctUntilChanged(),
      takeUntil(this.destroy$)
    );
  }

  /**
   * Every cycle's result as it completes
   */
  getResults(): Observable<SyncResult> {
    return this.results$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getTuning(): Observable<PowerTuning> {
    return this.tuning$.asObservable().pipe(takeUntil(this.destroy$));
  }

  destroy(): void {
    this.stop();
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.state$.complete();
    this.results$.complete();
    this.tuning$.complete();
  }

  private async runCycle(): Promise<SyncResult> {
    this.scheduler.cancel();
    this.updateState({ status: 'syncing' });

    const startedAt = this.config.now();
    const batchSize = this.batchSize;
    const since = this.watermark;
    let uploaded = 0;
    let downloaded = 0;
    let conflicts = 0;
    let uploadError: TidesyncError | undefined;
    let downloadError: TidesyncError | undefined;

    this.logger.debug('Sync cycle started', { batchSize, since });

    try {
      let batch: SyncRecord[] = [];
      try {
        batch = await this.store.fetchPending(batchSize);
      } catch (error) {
        uploadError = ensureTidesyncError(error, 'TIDE_S300');
        this.logger.error('Failed to read pending records', uploadError);
      }

      const [uploadOutcome, downloadOutcome] = await Promise.allSettled([
        batch.length > 0
          ? this.callRemote('upload', () => this.cloud.upload(batch))
          : Promise.resolve<UploadResponse>({ acceptedIds: [] }),
        this.callRemote('download', () => this.cloud.download(since)),
      ]);

      if (uploadOutcome.status === 'fulfilled') {
        try {
          uploaded = await this.confirmUploaded(batch, uploadOutcome.value);
        } catch (error) {
          uploadError = ensureTidesyncError(error, 'TIDE_S300');
          this.logger.error('Failed to clear uploaded records', uploadError);
        }
      } else {
        uploadError = ensureTidesyncError(uploadOutcome.reason, 'TIDE_C510');
        this.logger.warn('Upload failed, records stay pending', {
          count: batch.length,
          code: uploadError.code,
          error: uploadError.message,
        });
      }

      if (downloadOutcome.status === 'fulfilled') {
        downloaded = downloadOutcome.value.length;
        try {
          if (downloaded > 0) {
            conflicts = await this.merge(downloadOutcome.value);
          }
          this.watermark = startedAt;
        } catch (error) {
          downloadError = ensureTidesyncError(error, 'TIDE_S300');
          this.logger.error('Failed to merge downloaded records', downloadError);
        }
      } else {
        downloadError = ensureTidesyncError(downloadOutcome.reason, 'TIDE_C520');
        this.logger.warn('Download failed, watermark kept', {
          since,
          code: downloadError.code,
          error: downloadError.message,
        });
      }
    } catch (error) {
      const unexpected = ensureTidesyncError(error);
      this.logger.error('Sync cycle aborted', unexpected);
      uploadError ??= unexpected;
    }

    const result: SyncResult = {
      uploaded,
      downloaded,
      conflicts,
      startedAt,
      completedAt: this.config.now(),
      ...(uploadError && { uploadError }),
      ...(downloadError && { downloadError }),
    };

    this.inFlight = null;
    this.updateState({ status: 'idle', lastSync: result.completedAt, lastResult: result });
    this.results$.next(result);
    if (this.running && this.config.autoSchedule) {
      this.scheduler.schedule();
    }

    this.logger.info('Sync cycle completed', {
      uploaded,
      downloaded,
      conflicts,
      durationMs: result.completedAt - startedAt,
    });
    return result;
  }

  /**
   * Clear accepted ids of the batch from the pending set. Ids the server
   * reports that were not part of the batch are ignored.
   */
  private async confirmUploaded(batch: SyncRecord[], response: UploadResponse): Promise<number> {
    const versions = new Map(batch.map((record) => [record.id, record.version]));
    const accepted = [...new Set(response.acceptedIds)].filter((id) => versions.has(id));

    if (accepted.length < response.acceptedIds.length) {
      this.logger.warn('Server confirmed ids outside the uploaded batch', {
        reported: response.acceptedIds.length,
        matched: accepted.length,
      });
    }

    await this.store.markSynced(accepted, { versions });
    return accepted.length;
  }

  /**
   * Merge remote records into the store. Writes are compare-and-set against
   * the snapshot the decision was made on; a record written locally in the
   * meantime keeps the local write. Remote writes leave pending marks as they
   * are: only an accepted upload clears an id.
   */
  private async merge(remote: SyncRecord[]): Promise<number> {
    const snapshot = await this.store.fetchAll();
    const local = new Map(snapshot.map((record) => [record.id, record]));
    let conflicts = 0;

    for (const incoming of remote) {
      const existing = local.get(incoming.id);

      if (!existing) {
        if (await this.store.save(incoming, { markPending: false, expectedVersion: null })) {
          local.set(incoming.id, incoming);
        } else {
          this.logger.debug('Remote insert skipped, record written locally', { id: incoming.id });
        }
        continue;
      }

      const resolution = this.resolver.resolve(existing, incoming);
      if (resolution.winner === 'local' || recordsEqual(existing, resolution.record)) continue;

      const written = await this.store.save(resolution.record, {
        markPending: false,
        expectedVersion: existing.version,
      });
      if (!written) {
        this.logger.debug('Remote update skipped, record written locally', { id: incoming.id });
        continue;
      }

      conflicts++;
      local.set(incoming.id, resolution.record);
    }

    return conflicts;
  }

  /**
   * Run one network leg, bounded by the cycle timeout
   */
  private callRemote<T>(leg: RemoteLeg, call: () => Promise<T>): Promise<T> {
    const ms = this.config.cycleTimeoutMs;
    const source$ = defer(call);
    if (ms <= 0) return firstValueFrom(source$);

    return firstValueFrom(
      source$.pipe(
        timeout({
          first: ms,
          with: () =>
            throwError(
              () => new ConnectionError('TIDE_C504', `${leg} timed out after ${ms}ms`, { leg, timeout: ms })
            ),
        })
      )
    );
  }

  private async writeLocal(record: SyncRecord): Promise<void> {
    const existing = await this.store.get(record.id);
    if (existing && record.version <= existing.version) {
      throw new ValidationError(
        [{ path: 'version', message: `must be greater than stored version ${existing.version}` }],
        { id: record.id, storedVersion: existing.version }
      );
    }

    const written = await this.store.save(record, { expectedVersion: existing?.version ?? null });
    if (!written) {
      throw new ValidationError(
        [{ path: 'version', message: 'record was written concurrently, re-read and retry' }],
        { id: record.id }
      );
    }
    this.logger.debug('Record enqueued', { id: record.id, version: record.version });
  }

  private updateState(partial: Partial<SyncEngineState>): void {
    if (this.destroyed) return;
    this.state$.next({ ...this.state$.getValue(), ...partial });
  }
}

function validateTimings(config: ResolvedConfig): void {
  const errors: FieldValidationError[] = [];
  if (!(config.cycleTimeoutMs >= 0)) {
    errors.push({ path: 'cycleTimeoutMs', message: 'must be >= 0' });
  }
  if (!(config.reachabilityDebounceMs >= 0)) {
    errors.push({ path: 'reachabilityDebounceMs', message: 'must be >= 0' });
  }
  if (errors.length > 0) {
    throw new ValidationError(errors, undefined, 'TIDE_V101');
  }
}

/**
 * Create a sync engine
 */
export function createSyncEngine(config: SyncEngineConfig): SyncEngine {
  return new SyncEngine(config);
}
