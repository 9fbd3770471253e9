import { Config as EffectConfig, Duration, Effect } from "effect";
import { ConfigurationError } from "./errors/configuration.error.js";

export const AppConfig = {
  simulationApi: {
    baseUrl: EffectConfig.string("SIM_API_BASE_URL").pipe(
      EffectConfig.withDefault("http://127.0.0.1:5000")
    ),
    timeoutMs: EffectConfig.integer("SIM_API_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(5_000)
    ),
    retries: EffectConfig.integer("SIM_API_RETRIES").pipe(
      EffectConfig.withDefault(2)
    ),
  },

  simulation: {
    batteryCapacityMaxKwh: EffectConfig.number("BATTERY_CAPACITY_MAX_KWH").pipe(
      EffectConfig.withDefault(46.3)
    ),
    chargingPowerKw: EffectConfig.number("CHARGING_POWER_KW").pipe(
      EffectConfig.withDefault(7.4)
    ),
    siteLoadCapKw: EffectConfig.number("SITE_LOAD_CAP_KW").pipe(
      EffectConfig.withDefault(11)
    ),
    targetSocRatio: EffectConfig.number("TARGET_SOC_RATIO").pipe(
      EffectConfig.withDefault(0.8)
    ),
    startSocRatio: EffectConfig.number("START_SOC_RATIO").pipe(
      EffectConfig.withDefault(0.2)
    ),
    tickIntervalMs: EffectConfig.integer("TICK_INTERVAL_MS").pipe(
      EffectConfig.withDefault(4_000)
    ),
    maxConsecutiveTelemetryTimeouts: EffectConfig.integer("MAX_CONSECUTIVE_TELEMETRY_TIMEOUTS").pipe(
      EffectConfig.withDefault(3)
    ),
  },
};

export type SimulationSettings = {
  readonly batteryCapacityMaxKwh: number;
  readonly chargingPowerKw: number;
  readonly siteLoadCapKw: number;
  readonly targetSocRatio: number; // share of max capacity to stop charging at
  readonly startSocRatio: number; // share of max capacity the simulator resets the battery to
  readonly tickInterval: Duration.Duration;
  readonly maxConsecutiveTelemetryTimeouts: number;
};

const isRatio = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;
const isPositive = (value: number) => Number.isFinite(value) && value > 0;

/**
 * Checks the simulation constants once, before any run can be started.
 */
export const makeSimulationSettings = (raw: {
  readonly batteryCapacityMaxKwh: number;
  readonly chargingPowerKw: number;
  readonly siteLoadCapKw: number;
  readonly targetSocRatio: number;
  readonly startSocRatio: number;
  readonly tickIntervalMs: number;
  readonly maxConsecutiveTelemetryTimeouts: number;
}): Effect.Effect<SimulationSettings, ConfigurationError> => {
  const problems: string[] = [];

  if (!isPositive(raw.batteryCapacityMaxKwh)) {
    problems.push(`battery capacity must be positive, got ${raw.batteryCapacityMaxKwh}`);
  }
  if (!isPositive(raw.chargingPowerKw)) {
    problems.push(`charging power must be positive, got ${raw.chargingPowerKw}`);
  }
  if (!isPositive(raw.siteLoadCapKw)) {
    problems.push(`site load cap must be positive, got ${raw.siteLoadCapKw}`);
  }
  if (!isRatio(raw.targetSocRatio)) {
    problems.push(`target SOC ratio must be within [0, 1], got ${raw.targetSocRatio}`);
  }
  if (!isRatio(raw.startSocRatio)) {
    problems.push(`start SOC ratio must be within [0, 1], got ${raw.startSocRatio}`);
  }
  if (isRatio(raw.targetSocRatio) && isRatio(raw.startSocRatio) && raw.startSocRatio > raw.targetSocRatio) {
    problems.push('start SOC ratio cannot exceed the target SOC ratio');
  }
  if (!Number.isInteger(raw.tickIntervalMs) || raw.tickIntervalMs < 0) {
    problems.push(`tick interval must be a non-negative integer, got ${raw.tickIntervalMs}`);
  }
  if (!Number.isInteger(raw.maxConsecutiveTelemetryTimeouts) || raw.maxConsecutiveTelemetryTimeouts < 0) {
    problems.push(`max consecutive telemetry timeouts must be a non-negative integer, got ${raw.maxConsecutiveTelemetryTimeouts}`);
  }

  if (problems.length > 0) {
    return Effect.fail(new ConfigurationError({ message: `Invalid simulation settings: ${problems.join('; ')}` }));
  }

  return Effect.succeed({
    batteryCapacityMaxKwh: raw.batteryCapacityMaxKwh,
    chargingPowerKw: raw.chargingPowerKw,
    siteLoadCapKw: raw.siteLoadCapKw,
    targetSocRatio: raw.targetSocRatio,
    startSocRatio: raw.startSocRatio,
    tickInterval: Duration.millis(raw.tickIntervalMs),
    maxConsecutiveTelemetryTimeouts: raw.maxConsecutiveTelemetryTimeouts,
  });
};

export const loadSimulationSettings = Effect.gen(function* () {
  const config = AppConfig.simulation;

  return yield* makeSimulationSettings({
    batteryCapacityMaxKwh: yield* config.batteryCapacityMaxKwh,
    chargingPowerKw: yield* config.chargingPowerKw,
    siteLoadCapKw: yield* config.siteLoadCapKw,
    targetSocRatio: yield* config.targetSocRatio,
    startSocRatio: yield* config.startSocRatio,
    tickIntervalMs: yield* config.tickIntervalMs,
    maxConsecutiveTelemetryTimeouts: yield* config.maxConsecutiveTelemetryTimeouts,
  });
});
