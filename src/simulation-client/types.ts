import { Context, type Effect } from "effect";
import type { HourlyProfile } from "../schedule-optimizer/types.js";
import type { TransportError } from "./errors.js";

/**
 * Snapshot of the simulated clock and battery.
 * `simHour` is 24 only as the end-of-day sentinel.
 */
export type Telemetry = {
  readonly simHour: number;
  readonly simMinute: number;
  readonly baseCurrentLoad: number;
  readonly batteryCapacityKwh: number;
};

export class SimulationClient extends Context.Tag("SimulationClient")<
  SimulationClient,
  {
    readonly getBaseLoad: () => Effect.Effect<HourlyProfile, TransportError>;
    readonly getPriceProfile: () => Effect.Effect<HourlyProfile, TransportError>;
    readonly getInfo: () => Effect.Effect<Telemetry, TransportError>;
    readonly setDischarge: (on: boolean) => Effect.Effect<void, TransportError>;
    readonly setCharge: (on: boolean) => Effect.Effect<void, TransportError>;
  }
>() {}

export type ISimulationClient = Context.Tag.Service<typeof SimulationClient>;
