import { Data } from "effect";

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  message: string;
}> {}
