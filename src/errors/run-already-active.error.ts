import { Data } from "effect";

export class RunAlreadyActiveError extends Data.TaggedError("RunAlreadyActive") {
  public override readonly message = 'A simulation run is already active.';
}
