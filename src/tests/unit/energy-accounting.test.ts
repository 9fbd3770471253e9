import { describe, it, expect } from "@effect/vitest";
import { energySample, indexedHour, totalEnergyUsed } from "../../energy-accounting.js";
import type { Telemetry } from "../../simulation-client/types.js";

const settings = {
  batteryCapacityMaxKwh: 40,
  chargingPowerKw: 8,
  siteLoadCapKw: 10,
  startSocRatio: 0.25,
};

const flat = (value: number) => Array.from({ length: 24 }, () => value);

const telemetry = (simHour: number, simMinute: number, batteryCapacityKwh: number): Telemetry => ({
  simHour,
  simMinute,
  baseCurrentLoad: 1,
  batteryCapacityKwh,
});

describe("energy-accounting", () => {
  describe("indexedHour", () => {
    it("should clamp the end-of-day hour to the last hour", () => {
      expect(indexedHour(0)).toBe(0);
      expect(indexedHour(23)).toBe(23);
      expect(indexedHour(24)).toBe(23);
    });
  });

  describe("energySample", () => {
    it("should include charging power in the load while charging", () => {
      const sample = energySample(telemetry(5, 30, 20), flat(1), true, settings);

      expect(sample).toEqual({ hourDecimal: 5.5, socPercent: 50, loadPercent: 90 });
    });

    it("should read the last hour's base load at the end of the day", () => {
      const baseLoad = flat(1);
      baseLoad[23] = 2;

      const sample = energySample(telemetry(24, 0, 30), baseLoad, false, settings);

      expect(sample).toEqual({ hourDecimal: 24, socPercent: 75, loadPercent: 20 });
    });
  });

  describe("totalEnergyUsed", () => {
    it("should be zero at the start of the day with the battery at its start level", () => {
      expect(totalEnergyUsed(telemetry(0, 0, 10), flat(1), settings)).toBe(0);
    });

    it("should add full hours and the running share of the current hour", () => {
      const baseLoad = flat(1);
      baseLoad[3] = 2;

      // 12 - 10 + (1 + 1 + 1) + 2 * 0.5
      expect(totalEnergyUsed(telemetry(3, 30, 12), baseLoad, settings)).toBe(6);
    });

    it("should count the whole day's base load at hour 24", () => {
      expect(totalEnergyUsed(telemetry(24, 0, 30), flat(1), settings)).toBe(44);
    });
  });
});
