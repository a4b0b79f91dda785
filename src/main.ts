import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Duration, Effect, Logger, LogLevel } from "effect"
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { App } from './app.js';
import { AppConfig } from './config.js';
import { PriceCoordinator } from './coordinator/types.js';
import { serviceLayers } from './layers.js';
import { selectSensors } from './sensors/index.js';

const isProd = process.env.NODE_ENV == 'production';
const sentryDsn = process.env.SENTRY_DSN;

if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    tracesSampleRate: 1.0,
  });
}

const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "energy-price-sensors" },
  spanProcessor: new SentrySpanProcessor()
}))

const program = Effect.gen(function*() {
  const coordinator = yield* PriceCoordinator;
  const sensors = yield* selectSensors(yield* AppConfig.sensors.displayOptions);
  const refreshInterval = Duration.minutes(yield* AppConfig.coordinator.refreshIntervalMinutes);

  const app = new App(
    coordinator,
    sensors,
    refreshInterval,
    (err) => {
      Sentry.captureException(err);
    },
  );

  yield* Effect.addFinalizer(() => app.stop());

  yield* app.start();
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeSdkLive),
  Effect.provide(NodeHttpClient.layer),
  Effect.scoped,
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);
NodeRuntime.runMain(program);

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});
