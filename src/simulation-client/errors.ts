import { Data } from "effect";

export type TransportFailureReason =
  | 'Unreachable' // connection refused, DNS, socket reset
  | 'Timeout'
  | 'Malformed' // body is not the expected record
  | 'Rejected'; // non-2xx status or an error record from the service

export class TransportError extends Data.TaggedError("TransportError")<{
  reason: TransportFailureReason;
  operation: string;
  message: string;
  cause?: unknown;
}> {}
