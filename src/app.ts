import { Duration, Effect, Schedule } from 'effect';
import type { ColdStartRefreshError, IPriceCoordinator } from './coordinator/types.js';
import { readSensors, type SensorDescription, type SensorSnapshot } from './sensors/index.js';


enum AppStatus {
  Pending,
  Running,
  Stopped,
}

export type ErrorReporter = (error: ColdStartRefreshError) => void;

export class App {
  private appStatus: AppStatus = AppStatus.Pending;

  private snapshot: SensorSnapshot | null = null;

  public constructor(
    private readonly coordinator: IPriceCoordinator,
    private readonly sensors: readonly SensorDescription[],
    private readonly refreshInterval: Duration.Duration = Duration.minutes(60),
    private readonly reportError: ErrorReporter = () => undefined,
  ) { }

  public start(): Effect.Effect<void> {
    this.appStatus = AppStatus.Running;
    const deps = this;

    return Effect.gen(function* () {
      yield* Effect.log(`Starting price refresh every ${Duration.format(deps.refreshInterval)} with ${deps.sensors.length} sensors`);

      yield* Effect.repeat(
        deps.tick().pipe(
          Effect.withSpan('refreshTick'),
          Effect.map(() => deps.appStatus),
        ),
        {
          schedule: Schedule.spaced(deps.refreshInterval),
          while: (appStatus) => appStatus === AppStatus.Running,
        }
      );
    });
  }

  // The in-flight tick is allowed to finish; the loop ends afterwards
  public stop(): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      yield* Effect.log('Stopping price refresh');
      deps.appStatus = AppStatus.Stopped;
    });
  }

  public tick(): Effect.Effect<SensorSnapshot> {
    const deps = this;

    return Effect.gen(function* () {
      yield* deps.coordinator.refresh().pipe(
        Effect.tap(({ updated, failed }) => Effect.logInfo(
          `Refresh finished. Updated: [${updated.join(', ')}], failed: [${failed.map(({ commodity }) => commodity).join(', ')}]`
        )),
        Effect.catchTag('ColdStartRefresh', (err) => Effect.gen(function* () {
          yield* Effect.logError(`Prices unavailable: ${err.message}`);
          deps.reportError(err);
        })),
      );

      const snapshot = yield* readSensors(deps.coordinator, deps.sensors);
      deps.snapshot = snapshot;

      for (const reading of snapshot.readings) {
        yield* Effect.logDebug(`${reading.key} = ${reading.value ?? 'unavailable'} ${reading.unit}${reading.stale ? ' (stale)' : ''}`);
      }

      return snapshot;
    });
  }

  public latestSnapshot(): SensorSnapshot | null {
    return this.snapshot;
  }
}
