import { Deferred, Effect, Either, Option, Ref } from "effect";
import type { SimulationSettings } from "../config.js";
import { energySample, indexedHour, totalEnergyUsed, type EnergySample } from "../energy-accounting.js";
import { RunAlreadyActiveError } from "../errors/run-already-active.error.js";
import type { IPresentationSink } from "../presentation-sink/types.js";
import {
  computeSchedule,
  costProfileFor,
  hoursNeeded,
  scheduledHours,
  withinSiteCap,
  type HourlyProfile,
  type RunMode,
  type Schedule,
} from "../schedule-optimizer/index.js";
import type { TransportError } from "../simulation-client/errors.js";
import type { ISimulationClient, Telemetry } from "../simulation-client/types.js";
import { decideChargeCommand } from "./charging-policy.js";
import type { ControllerStatus, RunHandle, RunOutcome } from "./types.js";

export type { ControllerStatus, RunHandle, RunOutcome } from "./types.js";

type ActiveRun = {
  readonly abortSignal: Deferred.Deferred<void>;
};

type RunState = {
  charging: boolean;
  lastSimHour: number;
  consecutiveTelemetryTimeouts: number;
  totalEnergyUsedKwh: number;
  readonly samples: EnergySample[];
};

type PreparedRun = {
  readonly mode: RunMode;
  readonly baseLoad: HourlyProfile;
  readonly schedule: Schedule;
  readonly abortSignal: Deferred.Deferred<void>;
  readonly state: RunState;
};

type TickResult = 'Continue' | 'EndOfDay';

export class SimulationController {
  private readonly activeRun: Ref.Ref<Option.Option<ActiveRun>> = Ref.unsafeMake(Option.none());

  public constructor(
    private readonly client: ISimulationClient,
    private readonly sink: IPresentationSink,
    private readonly settings: SimulationSettings,
  ) { }

  private get targetCapacityKwh() {
    return this.settings.batteryCapacityMaxKwh * this.settings.targetSocRatio;
  }

  public status(): Effect.Effect<ControllerStatus> {
    return Ref.get(this.activeRun).pipe(
      Effect.map((run): ControllerStatus => (Option.isSome(run) ? 'Running' : 'Idle')),
    );
  }

  /**
   * Prepares a run and forks its tick loop. Resolves as soon as the loop is running;
   * use `RunHandle.await` for the outcome.
   */
  public start(mode: RunMode): Effect.Effect<RunHandle, RunAlreadyActiveError | TransportError> {
    const deps = this;

    return Effect.gen(function* () {
      const run: ActiveRun = { abortSignal: yield* Deferred.make<void>() };

      const claimed = yield* Ref.modify(deps.activeRun, (current): [boolean, Option.Option<ActiveRun>] =>
        Option.isSome(current) ? [false, current] : [true, Option.some(run)]
      );

      if (!claimed) {
        yield* Effect.logWarning('Start requested while a run is active; ignoring', { mode });
        return yield* new RunAlreadyActiveError();
      }

      const prepared = yield* deps.prepare(mode, run).pipe(
        Effect.onError(() => deps.release(run)),
      );

      const completion = yield* Deferred.make<RunOutcome>();

      yield* deps.runToCompletion(prepared).pipe(
        Effect.flatMap((outcome) => Deferred.succeed(completion, outcome)),
        Effect.forkDaemon,
      );

      const handle: RunHandle = {
        mode,
        schedule: prepared.schedule,
        await: Deferred.await(completion),
        samples: Effect.sync(() => [...prepared.state.samples]),
      };

      return handle;
    });
  }

  /**
   * Asks the active run to stop at its next tick boundary. Does nothing when idle.
   */
  public abort(): Effect.Effect<void> {
    return Ref.get(this.activeRun).pipe(
      Effect.flatMap(Option.match({
        onNone: () => Effect.logDebug('Abort requested while idle'),
        onSome: (run) => Effect.log('Abort requested').pipe(
          Effect.zipRight(Deferred.succeed(run.abortSignal, undefined)),
          Effect.asVoid,
        ),
      })),
    );
  }

  private prepare(mode: RunMode, run: ActiveRun): Effect.Effect<PreparedRun, TransportError> {
    const deps = this;
    const settings = this.settings;

    return Effect.gen(function* () {
      // the simulator resets its clock and battery on discharge
      yield* deps.client.setDischarge(true);

      const baseLoad = yield* deps.client.getBaseLoad();
      const price = yield* deps.client.getPriceProfile();
      const telemetry = yield* deps.client.getInfo();

      yield* deps.sink.onBaseProfiles(baseLoad, price);

      const needed = hoursNeeded(settings.batteryCapacityMaxKwh, telemetry.batteryCapacityKwh, settings.chargingPowerKw);
      const schedule = computeSchedule(
        costProfileFor(mode, { baseLoad, price }),
        needed,
        withinSiteCap(baseLoad, settings.chargingPowerKw, settings.siteLoadCapKw),
      );

      yield* Effect.log('Charging schedule computed', {
        mode,
        hoursNeeded: needed,
        scheduledHours: scheduledHours(schedule),
      });
      yield* deps.sink.onScheduleComputed(schedule, mode);

      const state: RunState = {
        charging: false,
        lastSimHour: 0,
        consecutiveTelemetryTimeouts: 0,
        totalEnergyUsedKwh: 0,
        samples: [],
      };

      const seed = deps.record(state, telemetry, baseLoad);
      yield* deps.sink.onSample(seed, state.totalEnergyUsedKwh);

      return { mode, baseLoad, schedule, abortSignal: run.abortSignal, state };
    }).pipe(
      Effect.withSpan('SimulationController.prepare'),
    );
  }

  private runToCompletion(run: PreparedRun): Effect.Effect<RunOutcome> {
    const deps = this;

    return Effect.gen(function* () {
      const loopResult = yield* deps.tickLoop(run).pipe(Effect.either);
      let failure = Either.isLeft(loopResult) ? Option.some(loopResult.left) : Option.none<TransportError>();

      if (run.state.charging) {
        const stopped = yield* deps.client.setCharge(false).pipe(Effect.either);

        if (Either.isRight(stopped)) {
          run.state.charging = false;
        } else {
          yield* Effect.logError('Failed to stop charging at the end of the run', stopped.left);
          failure = Option.orElse(failure, () => Option.some(stopped.left));
        }
      }

      const summary = deps.summary(run);
      let outcome: RunOutcome;

      if (Option.isSome(failure)) {
        outcome = { _tag: 'Failed', error: failure.value, ...summary };
      } else if (Either.isRight(loopResult) && loopResult.right === 'Completed') {
        outcome = { _tag: 'Completed', ...summary };
      } else {
        outcome = { _tag: 'Aborted', ...summary };
      }

      yield* deps.sink.onRunEnded(outcome);
      yield* deps.release(run);

      return outcome;
    });
  }

  private tickLoop(run: PreparedRun): Effect.Effect<'Completed' | 'Aborted', TransportError> {
    const deps = this;

    return Effect.gen(function* () {
      while (true) {
        if (yield* Deferred.isDone(run.abortSignal)) {
          return 'Aborted' as const;
        }

        const result = yield* deps.tick(run).pipe(
          Effect.withSpan('SimulationController.tick'),
        );

        if (result === 'EndOfDay') {
          return 'Completed' as const;
        }

        // an abort wakes the loop early; the check above then ends it
        yield* Effect.race(
          Effect.sleep(deps.settings.tickInterval),
          Deferred.await(run.abortSignal),
        );
      }
    });
  }

  private tick(run: PreparedRun): Effect.Effect<TickResult, TransportError> {
    const deps = this;
    const state = run.state;

    return Effect.gen(function* () {
      const fetched = yield* deps.client.getInfo().pipe(Effect.either);

      if (Either.isLeft(fetched)) {
        const error = fetched.left;

        if (error.reason === 'Timeout' && state.consecutiveTelemetryTimeouts < deps.settings.maxConsecutiveTelemetryTimeouts) {
          state.consecutiveTelemetryTimeouts++;
          yield* Effect.logWarning('Telemetry timed out, retrying next tick', {
            consecutiveTimeouts: state.consecutiveTelemetryTimeouts,
          });
          return 'Continue' as const;
        }

        return yield* Effect.fail(error);
      }

      state.consecutiveTelemetryTimeouts = 0;
      let telemetry = fetched.right;

      // The clock only goes backwards when the simulated day wraps. Hour 24 plots the last point.
      // TODO: a clock that jitters backwards ends the run early; needs a day counter from /info.
      if (telemetry.simHour < state.lastSimHour) {
        telemetry = { ...telemetry, simHour: 24, simMinute: 0 };
      } else {
        state.lastSimHour = telemetry.simHour;
      }

      const command = decideChargeCommand({
        charging: state.charging,
        batteryCapacityKwh: telemetry.batteryCapacityKwh,
        targetCapacityKwh: deps.targetCapacityKwh,
        schedule: run.schedule,
        hour: indexedHour(telemetry.simHour),
      });

      if (command === 'StopCharging') {
        yield* Effect.log('Stopping charging', { simHour: telemetry.simHour, batteryCapacityKwh: telemetry.batteryCapacityKwh });
        yield* deps.client.setCharge(false);
        state.charging = false;
      } else if (command === 'StartCharging') {
        yield* Effect.log('Starting charging', { simHour: telemetry.simHour, batteryCapacityKwh: telemetry.batteryCapacityKwh });
        // set first: a failed "on" command may still have reached the charger
        state.charging = true;
        yield* deps.client.setCharge(true);
      }

      const sample = deps.record(state, telemetry, run.baseLoad);

      if (!(yield* Deferred.isDone(run.abortSignal))) {
        yield* deps.sink.onSample(sample, state.totalEnergyUsedKwh);
      }

      const result: TickResult = telemetry.simHour === 24 ? 'EndOfDay' : 'Continue';
      return result;
    });
  }

  private record(state: RunState, telemetry: Telemetry, baseLoad: HourlyProfile): EnergySample {
    const sample = energySample(telemetry, baseLoad, state.charging, this.settings);

    state.samples.push(sample);
    state.totalEnergyUsedKwh = totalEnergyUsed(telemetry, baseLoad, this.settings);

    return sample;
  }

  private summary(run: PreparedRun) {
    return {
      mode: run.mode,
      samples: run.state.samples.length,
      totalEnergyUsedKwh: run.state.totalEnergyUsedKwh,
    };
  }

  // Only clears the slot if it still belongs to this run.
  private release(run: { readonly abortSignal: Deferred.Deferred<void> }): Effect.Effect<void> {
    return Ref.update(this.activeRun, (current) =>
      Option.isSome(current) && current.value.abortSignal === run.abortSignal ? Option.none() : current
    );
  }
}
