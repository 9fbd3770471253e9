import { Effect, Layer } from "effect";
import type { EnergySample } from "../energy-accounting.js";
import type { HourlyProfile, RunMode, Schedule } from "../schedule-optimizer/types.js";
import type { RunOutcome } from "../simulation-controller/types.js";
import { PresentationSink, type IPresentationSink } from "./types.js";

// "#" marks an hour with charging permitted
export const formatSchedule = (schedule: Schedule): string =>
  schedule.map((permitted) => (permitted ? '#' : '.')).join('');

export const formatProfile = (profile: HourlyProfile): string =>
  profile.map((value) => value.toFixed(2)).join(' ');

export const formatHour = (hourDecimal: number): string => {
  const totalMinutes = Math.round(hourDecimal * 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
};

export class LoggingPresentationSink implements IPresentationSink {

  public onBaseProfiles(baseLoad: HourlyProfile, price: HourlyProfile) {
    return Effect.all([
      Effect.log(`Residential base load (kWh): ${formatProfile(baseLoad)}`),
      Effect.log(`Energy price: ${formatProfile(price)}`),
    ], { discard: true });
  }

  public onScheduleComputed(schedule: Schedule, mode: RunMode) {
    return Effect.log(`Charging schedule (${mode}): ${formatSchedule(schedule)}`);
  }

  public onSample(sample: EnergySample, totalEnergyUsedKwh: number) {
    return Effect.log(
      `${formatHour(sample.hourDecimal)} SOC ${sample.socPercent.toFixed(1)}% `
      + `load ${sample.loadPercent.toFixed(1)}% total used ${totalEnergyUsedKwh.toFixed(2)} kWh`
    );
  }

  public onRunEnded(outcome: RunOutcome) {
    const summary = {
      mode: outcome.mode,
      samples: outcome.samples,
      totalEnergyUsedKwh: outcome.totalEnergyUsedKwh,
    };

    switch (outcome._tag) {
      case 'Completed':
        return Effect.log('Simulation completed', summary);
      case 'Aborted':
        return Effect.log('Simulation aborted', summary);
      case 'Failed':
        return Effect.logError(`Simulation failed: ${outcome.error.message}`, {
          ...summary,
          operation: outcome.error.operation,
          reason: outcome.error.reason,
        });
    }
  }
}

export const LoggingPresentationSinkLayer = Layer.succeed(PresentationSink, new LoggingPresentationSink());
