import { describe, it, expect } from "@effect/vitest";
import { ConfigProvider, Duration, Effect, Exit } from "effect";
import { loadSimulationSettings, makeSimulationSettings } from "../../config.js";
import { ConfigurationError } from "../../errors/configuration.error.js";

const valid = {
  batteryCapacityMaxKwh: 46.3,
  chargingPowerKw: 7.4,
  siteLoadCapKw: 11,
  targetSocRatio: 0.8,
  startSocRatio: 0.2,
  tickIntervalMs: 4000,
  maxConsecutiveTelemetryTimeouts: 3,
};

describe("config", () => {
  describe("makeSimulationSettings", () => {
    it.effect("should accept valid settings", () => Effect.gen(function* () {
      const settings = yield* makeSimulationSettings(valid);

      expect(settings.batteryCapacityMaxKwh).toBe(46.3);
      expect(Duration.toMillis(settings.tickInterval)).toBe(4000);
    }));

    it.effect("should reject a non-positive charging power", () => Effect.gen(function* () {
      const result = yield* Effect.exit(makeSimulationSettings({ ...valid, chargingPowerKw: 0 }));

      expect(result).toStrictEqual(Exit.fail(new ConfigurationError({
        message: 'Invalid simulation settings: charging power must be positive, got 0',
      })));
    }));

    it.effect("should reject a start ratio above the target ratio", () => Effect.gen(function* () {
      const error = yield* Effect.flip(makeSimulationSettings({ ...valid, startSocRatio: 0.9 }));

      expect(error.message).toBe('Invalid simulation settings: start SOC ratio cannot exceed the target SOC ratio');
    }));

    it.effect("should list every problem", () => Effect.gen(function* () {
      const error = yield* Effect.flip(makeSimulationSettings({ ...valid, targetSocRatio: 1.5, tickIntervalMs: -1 }));

      expect(error.message).toBe(
        'Invalid simulation settings: target SOC ratio must be within [0, 1], got 1.5; '
        + 'tick interval must be a non-negative integer, got -1'
      );
    }));
  });

  describe("loadSimulationSettings", () => {
    it.effect("should read overrides from the environment and default the rest", () => Effect.gen(function* () {
      const settings = yield* loadSimulationSettings.pipe(
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map([
          ["CHARGING_POWER_KW", "11"],
          ["SITE_LOAD_CAP_KW", "16"],
        ]))),
      );

      expect(settings.chargingPowerKw).toBe(11);
      expect(settings.siteLoadCapKw).toBe(16);
      expect(settings.targetSocRatio).toBe(0.8);
      expect(settings.maxConsecutiveTelemetryTimeouts).toBe(3);
    }));
  });
});
