import type { SimulationSettings } from "./config.js";
import type { HourlyProfile } from "./schedule-optimizer/types.js";
import type { Telemetry } from "./simulation-client/types.js";

export type EnergySample = {
  readonly hourDecimal: number;
  readonly socPercent: number;
  readonly loadPercent: number;
};

type EnergySettings = Pick<
  SimulationSettings,
  'batteryCapacityMaxKwh' | 'chargingPowerKw' | 'siteLoadCapKw' | 'startSocRatio'
>;

/** Hour 24 marks the end of the day and reads the last hour's values. */
export const indexedHour = (simHour: number): number => (simHour >= 24 ? 23 : simHour);

export const energySample = (
  telemetry: Telemetry,
  baseLoad: HourlyProfile,
  charging: boolean,
  settings: EnergySettings,
): EnergySample => {
  const hour = indexedHour(telemetry.simHour);
  const drawKw = baseLoad[hour] + (charging ? settings.chargingPowerKw : 0);

  return {
    hourDecimal: telemetry.simHour + telemetry.simMinute / 60,
    socPercent: (100 * telemetry.batteryCapacityKwh) / settings.batteryCapacityMaxKwh,
    loadPercent: (100 * drawKw) / settings.siteLoadCapKw,
  };
};

/**
 * Energy used since the simulated day began: what went into the battery plus
 * the base load consumed so far, including the running share of the current hour.
 */
export const totalEnergyUsed = (
  telemetry: Telemetry,
  baseLoad: HourlyProfile,
  settings: EnergySettings,
): number => {
  const startEnergy = settings.batteryCapacityMaxKwh * settings.startSocRatio;
  const fullHours = Math.min(telemetry.simHour, 24);

  let baseLoadSoFar = 0;
  for (let hour = 0; hour < fullHours; hour++) {
    baseLoadSoFar += baseLoad[hour];
  }

  if (telemetry.simHour < 24) {
    baseLoadSoFar += baseLoad[telemetry.simHour] * (telemetry.simMinute / 60);
  }

  return telemetry.batteryCapacityKwh - startEnergy + baseLoadSoFar;
};
