import { describe, it, expect } from "@effect/vitest";
import { decideChargeCommand } from "../../simulation-controller/charging-policy.js";

const schedule = Array.from({ length: 24 }, (_, hour) => hour < 6);

describe("decideChargeCommand", () => {
  it("should start charging in a permitted hour below target", () => {
    expect(decideChargeCommand({
      charging: false, batteryCapacityKwh: 10, targetCapacityKwh: 32, schedule, hour: 2,
    })).toBe('StartCharging');
  });

  it("should stop charging once the target is reached even in a permitted hour", () => {
    expect(decideChargeCommand({
      charging: true, batteryCapacityKwh: 32, targetCapacityKwh: 32, schedule, hour: 2,
    })).toBe('StopCharging');
  });

  it("should stop charging when the hour is not permitted", () => {
    expect(decideChargeCommand({
      charging: true, batteryCapacityKwh: 10, targetCapacityKwh: 32, schedule, hour: 6,
    })).toBe('StopCharging');
  });

  it("should not start charging when the battery is already at target", () => {
    expect(decideChargeCommand({
      charging: false, batteryCapacityKwh: 33, targetCapacityKwh: 32, schedule, hour: 1,
    })).toBe('NoChange');
  });

  it("should keep charging in a permitted hour below target", () => {
    expect(decideChargeCommand({
      charging: true, batteryCapacityKwh: 20, targetCapacityKwh: 32, schedule, hour: 5,
    })).toBe('NoChange');
  });

  it("should stay off outside the schedule", () => {
    expect(decideChargeCommand({
      charging: false, batteryCapacityKwh: 10, targetCapacityKwh: 32, schedule, hour: 12,
    })).toBe('NoChange');
  });
});
