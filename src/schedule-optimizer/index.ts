import { Array as Arr, Option, Order } from "effect";
import {
  HOURS_PER_DAY,
  type BaseProfiles,
  type FeasibilityPredicate,
  type HourlyProfile,
  type RunMode,
  type Schedule,
} from "./types.js";

export type { BaseProfiles, FeasibilityPredicate, HourlyProfile, RunMode, Schedule } from "./types.js";

type HourCost = {
  readonly hour: number;
  readonly cost: number;
};

const byCost = Order.mapInput(Order.number, (entry: HourCost) => entry.cost);

/**
 * Permits charging in the `hoursNeeded` cheapest hours of the day.
 *
 * Ties keep hour-of-day order. An hour rejected by `feasible` stays off and is
 * not replaced by the next cheapest one.
 */
export const computeSchedule = (
  costs: HourlyProfile,
  hoursNeeded: number,
  feasible: FeasibilityPredicate,
): Schedule => {
  const schedule: boolean[] = Arr.replicate(false, HOURS_PER_DAY);

  if (hoursNeeded <= 0) {
    return schedule;
  }

  const entries = Arr.makeBy(HOURS_PER_DAY, (hour): HourCost => ({ hour, cost: costs[hour] }));

  // Arr.sort is stable
  for (const { hour } of Arr.take(Arr.sort(entries, byCost), hoursNeeded)) {
    schedule[hour] = feasible(hour);
  }

  return schedule;
};

/**
 * Whole hours of charging at full power needed to fill the battery.
 * Truncates, so a partial last hour is never scheduled.
 */
export const hoursNeeded = (
  batteryCapacityMaxKwh: number,
  currentCapacityKwh: number,
  chargingPowerKw: number,
): number => Math.floor((batteryCapacityMaxKwh - currentCapacityKwh) / chargingPowerKw);

/**
 * Charging at `hour` is feasible when base load plus charging power stays under the site cap.
 */
export const withinSiteCap = (
  baseLoad: HourlyProfile,
  chargingPowerKw: number,
  siteLoadCapKw: number,
): FeasibilityPredicate => (hour) => siteLoadCapKw - (baseLoad[hour] + chargingPowerKw) > 0;

export const costProfileFor = (mode: RunMode, profiles: BaseProfiles): HourlyProfile => {
  switch (mode) {
    case 'ByLoad':
      return profiles.baseLoad;
    case 'ByPrice':
      return profiles.price;
  }
};

export const scheduledHours = (schedule: Schedule): readonly number[] =>
  Arr.filterMap(schedule, (permitted, hour) => (permitted ? Option.some(hour) : Option.none()));
