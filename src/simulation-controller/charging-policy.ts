import type { Schedule } from "../schedule-optimizer/types.js";

export type ChargeCommand = 'StartCharging' | 'StopCharging' | 'NoChange';

/**
 * Decides the actuator command for one tick. A full battery wins over the schedule.
 */
export const decideChargeCommand = (input: {
  readonly charging: boolean;
  readonly batteryCapacityKwh: number;
  readonly targetCapacityKwh: number;
  readonly schedule: Schedule;
  readonly hour: number;
}): ChargeCommand => {
  const permitted = input.schedule[input.hour];
  const full = input.batteryCapacityKwh >= input.targetCapacityKwh;

  if (input.charging && (full || !permitted)) {
    return 'StopCharging';
  }

  if (!input.charging && !full && permitted) {
    return 'StartCharging';
  }

  return 'NoChange';
};
