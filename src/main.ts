#!/usr/bin/env node
import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Duration, Effect, Logger, LogLevel } from "effect"
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { loadSimulationSettings } from "./config.js";
import { serviceLayers } from "./layers.js";
import { PresentationSink } from "./presentation-sink/types.js";
import type { RunMode } from "./schedule-optimizer/types.js";
import { SimulationClient } from "./simulation-client/types.js";
import { SimulationController } from "./simulation-controller/index.js";

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "ev-charge-scheduler" },
  spanProcessor: new SentrySpanProcessor()
}))

const program = Effect.gen(function*() {
  const settings = yield* loadSimulationSettings;

  const controller = new SimulationController(
    yield* SimulationClient,
    yield* PresentationSink,
    settings,
  );

  const mode: RunMode = process.argv.includes('--by-price') ? 'ByPrice' : 'ByLoad';

  yield* Effect.log(`Starting simulation run optimizing ${mode === 'ByPrice' ? 'energy price' : 'residential load'}`);

  const run = yield* controller.start(mode);

  // Ctrl-C interrupts this fiber; the run gets to switch charging off before the process exits.
  yield* Effect.addFinalizer(() => controller.abort().pipe(
    Effect.zipRight(run.await),
    Effect.timeout(Duration.seconds(30)),
    Effect.catchAll((err) => Effect.logError(err)),
  ));

  const outcome = yield* run.await;

  if (outcome._tag === 'Failed') {
    return yield* Effect.fail(outcome.error);
  }
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
