import { Context, type Effect } from "effect";
import type { EnergySample } from "../energy-accounting.js";
import type { HourlyProfile, RunMode, Schedule } from "../schedule-optimizer/types.js";
import type { RunOutcome } from "../simulation-controller/types.js";

export class PresentationSink extends Context.Tag("PresentationSink")<
  PresentationSink,
  {
    readonly onBaseProfiles: (baseLoad: HourlyProfile, price: HourlyProfile) => Effect.Effect<void>;
    readonly onScheduleComputed: (schedule: Schedule, mode: RunMode) => Effect.Effect<void>;
    readonly onSample: (sample: EnergySample, totalEnergyUsedKwh: number) => Effect.Effect<void>;
    readonly onRunEnded: (outcome: RunOutcome) => Effect.Effect<void>;
  }
>() {}

export type IPresentationSink = Context.Tag.Service<typeof PresentationSink>;
