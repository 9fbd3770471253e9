import { describe, it, expect, vitest } from "@effect/vitest";
import {
  computeSchedule,
  costProfileFor,
  hoursNeeded,
  scheduledHours,
  withinSiteCap,
} from "../../schedule-optimizer/index.js";

const flat = (value: number) => Array.from({ length: 24 }, () => value);
const always = () => true;

describe("schedule-optimizer", () => {
  describe("computeSchedule", () => {
    it("should only schedule the cheap hour when the next cheapest would exceed the site cap", () => {
      const baseLoad = flat(5);
      baseLoad[10] = 1;

      const schedule = computeSchedule(baseLoad, 2, withinSiteCap(baseLoad, 7.4, 11));

      expect(scheduledHours(schedule)).toEqual([10]);
    });

    it("should pick the lowest cost hours", () => {
      const costs = Array.from({ length: 24 }, (_, hour) => 24 - hour);

      const schedule = computeSchedule(costs, 2, always);

      expect(scheduledHours(schedule)).toEqual([22, 23]);
    });

    it("should break ties by hour of day", () => {
      const costs = flat(3);
      costs[20] = 2;

      const schedule = computeSchedule(costs, 3, always);

      expect(scheduledHours(schedule)).toEqual([0, 1, 20]);
    });

    it("should not backfill an infeasible hour with the next cheapest", () => {
      const costs = Array.from({ length: 24 }, (_, hour) => hour);

      const schedule = computeSchedule(costs, 2, (hour) => hour !== 0);

      expect(scheduledHours(schedule)).toEqual([1]);
    });

    it.each([0, -3])("should return an all-off schedule when %i hours are needed", (needed) => {
      const feasible = vitest.fn(always);

      const schedule = computeSchedule(flat(1), needed, feasible);

      expect(schedule).toEqual(flat(0).map(() => false));
      expect(feasible).not.toHaveBeenCalled();
    });

    it("should evaluate every hour when the whole day is needed", () => {
      const feasible = vitest.fn((hour: number) => hour % 2 === 0);

      const schedule = computeSchedule(flat(1), 30, feasible);

      expect(feasible).toHaveBeenCalledTimes(24);
      expect(scheduledHours(schedule)).toEqual([0, 2, 4, 6, 8, 10, 12, 14, 16, 18, 20, 22]);
    });

    it("should give the same schedule for the same input", () => {
      const costs = [4, 2, 9, 2, 7, 1, 3, 3, 8, 6, 5, 0, 4, 2, 9, 2, 7, 1, 3, 3, 8, 6, 5, 0];

      expect(computeSchedule(costs, 5, always)).toEqual(computeSchedule(costs, 5, always));
    });
  });

  describe("hoursNeeded", () => {
    it.each([
      [50, 40, 7.4, 1],
      [46.3, 9.26, 7.4, 5],
      [50, 50, 7.4, 0],
      [40, 16, 8, 3],
    ])("should truncate (%d - %d) / %d to %d", (max, current, power, expected) => {
      expect(hoursNeeded(max, current, power)).toBe(expected);
    });
  });

  describe("withinSiteCap", () => {
    it("should allow charging only while base load plus charging stays under the cap", () => {
      const baseLoad = flat(1);
      baseLoad[3] = 3;
      baseLoad[4] = 4;

      const feasible = withinSiteCap(baseLoad, 7, 11);

      expect(feasible(0)).toBe(true);
      expect(feasible(3)).toBe(true);
      expect(feasible(4)).toBe(false);
    });
  });

  describe("costProfileFor", () => {
    it("should select the profile for the run mode", () => {
      const profiles = { baseLoad: flat(1), price: flat(2) };

      expect(costProfileFor('ByLoad', profiles)).toBe(profiles.baseLoad);
      expect(costProfileFor('ByPrice', profiles)).toBe(profiles.price);
    });
  });
});
