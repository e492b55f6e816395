/**
 * Reachability monitoring.
 *
 * Network path updates come from an injected {@link ReachabilitySource};
 * the {@link ReachabilityMonitor} turns them into "became usable" transitions
 * that the sync engine answers with `syncNow()`.
 *
 * @module reachability
 */

import {
  BehaviorSubject,
  catchError,
  debounceTime,
  defer,
  distinctUntilChanged,
  exhaustMap,
  filter,
  map,
  of,
  share,
  timer,
  type Observable,
} from 'rxjs';

/**
 * Network path status
 */
export type PathStatus = 'satisfied' | 'unsatisfied';

/**
 * Emitted each time the path becomes usable
 */
export interface ConnectivityTransition {
  status: 'satisfied';
  /** Previous known status, null on the first update */
  previous: PathStatus | null;
  timestamp: number;
}

/**
 * Source of network path updates.
 */
export interface ReachabilitySource {
  observe(): Observable<PathStatus>;
}

export interface ReachabilityMonitorOptions {
  /** Quiet period before a path update is trusted (ms, 0 = none). @default 0 */
  debounceMs?: number;
}

/**
 * Emits a transition whenever the network path becomes satisfied.
 *
 * Repeated `satisfied` updates collapse into one transition. Triggering an
 * engine that is already syncing is harmless, so debouncing only saves work.
 */
export class ReachabilityMonitor {
  private readonly status$ = new BehaviorSubject<PathStatus | null>(null);
  private readonly transitions$: Observable<ConnectivityTransition>;

  constructor(source: ReachabilitySource, options: ReachabilityMonitorOptions = {}) {
    const debounceMs = options.debounceMs ?? 0;
    const updates$ = source.observe();
    const settled$ = debounceMs > 0 ? updates$.pipe(debounceTime(debounceMs)) : updates$;

    this.transitions$ = settled$.pipe(
      distinctUntilChanged(),
      map((status) => {
        const previous = this.status$.getValue();
        this.status$.next(status);
        return { status, previous };
      }),
      filter((update) => update.status === 'satisfied'),
      map(
        ({ previous }): ConnectivityTransition => ({
          status: 'satisfied',
          previous,
          timestamp: Date.now(),
        })
      ),
      share()
    );
  }

  /**
   * Transitions into `satisfied`. Subscribing starts observing the source.
   */
  transitions(): Observable<ConnectivityTransition> {
    return this.transitions$;
  }

  /**
   * Last known path status, null before the first update
   */
  get status(): PathStatus | null {
    return this.status$.getValue();
  }

  /**
   * Observable of the last known path status
   */
  getStatus(): Observable<PathStatus | null> {
    return this.status$.asObservable();
  }
}

/**
 * Reachability source driven by explicit calls, for platforms that push
 * path updates (and for tests).
 */
export interface ManualReachabilitySource extends ReachabilitySource {
  setStatus(status: PathStatus): void;
}

export function createManualReachabilitySource(
  initial?: PathStatus
): ManualReachabilitySource {
  const path$ = new BehaviorSubject<PathStatus | null>(initial ?? null);

  return {
    observe: () =>
      path$.pipe(filter((status): status is PathStatus => status !== null)),
    setStatus: (status) => path$.next(status),
  };
}

export interface PollingReachabilityOptions {
  /** Resolves true when the remote authority is usable */
  probe: () => Promise<boolean>;
  /** Probe interval in ms. @default 15000 */
  intervalMs?: number;
}

/**
 * Reachability source that probes the remote on an interval, e.g. with
 * `HttpCloudClient#ping`. A probe that throws counts as unsatisfied; a probe
 * still running when the next tick fires is not doubled up.
 */
export function createPollingReachabilitySource(
  options: PollingReachabilityOptions
): ReachabilitySource {
  const intervalMs = options.intervalMs ?? 15_000;

  return {
    observe: () =>
      timer(0, intervalMs).pipe(
        exhaustMap(() =>
          defer(options.probe).pipe(
            map((ok): PathStatus => (ok ? 'satisfied' : 'unsatisfied')),
            catchError(() => of<PathStatus>('unsatisfied'))
          )
        )
      ),
  };
}
