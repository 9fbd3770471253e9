import type { Effect } from "effect";
import type { EnergySample } from "../energy-accounting.js";
import type { RunMode, Schedule } from "../schedule-optimizer/types.js";
import type { TransportError } from "../simulation-client/errors.js";

export type ControllerStatus = 'Idle' | 'Running';

type RunSummary = {
  readonly mode: RunMode;
  readonly samples: number;
  readonly totalEnergyUsedKwh: number;
};

export type RunOutcome =
  | ({ readonly _tag: 'Completed' } & RunSummary)
  | ({ readonly _tag: 'Aborted' } & RunSummary)
  | ({ readonly _tag: 'Failed'; readonly error: TransportError } & RunSummary);

export type RunHandle = {
  readonly mode: RunMode;
  readonly schedule: Schedule;
  /** Resolves once per run, after charging has been switched off. */
  readonly await: Effect.Effect<RunOutcome>;
  readonly samples: Effect.Effect<readonly EnergySample[]>;
};
