import { Duration, Effect, Either, Layer, ParseResult, Schedule, Schema } from "effect";
import { HttpClient, type HttpClientError, type HttpClientResponse } from "@effect/platform";
import { raw } from "@effect/platform/HttpBody";
import { AppConfig } from "../config.js";
import { TransportError } from "./errors.js";
import {
  ApiErrorSchema,
  ChargingInfoSchema,
  ChargingStateSchema,
  DischargingStateSchema,
  HourlyProfileSchema,
  type ChargingInfo,
} from "./schema.js";
import { SimulationClient, type ISimulationClient, type Telemetry } from "./types.js";

export type HttpSimulationClientConfig = {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly retries: number; // extra attempts on timeouts and transport failures
};

const RETRY_BASE_DELAY = Duration.millis(200);

const isApiError = Schema.is(ApiErrorSchema);

/**
 * Decides once, at the wire boundary, whether a body is the expected record or an error record.
 */
const decodeApiResult = <A, I>(schema: Schema.Schema<A, I>) => {
  const decode = Schema.decodeUnknownEither(Schema.Union(ApiErrorSchema, schema));

  return (operation: string, body: unknown): Either.Either<A, TransportError> =>
    Either.match(decode(body), {
      onLeft: (parseError) => Either.left(new TransportError({
        reason: 'Malformed',
        operation,
        message: `Unrecognized response: ${ParseResult.TreeFormatter.formatErrorSync(parseError)}`,
        cause: parseError,
      })),
      onRight: (decoded) => isApiError(decoded)
        ? Either.left(new TransportError({ reason: 'Rejected', operation, message: decoded.error }))
        : Either.right(decoded),
    });
};

const decodeProfile = decodeApiResult(HourlyProfileSchema);
const decodeChargingInfo = decodeApiResult(ChargingInfoSchema);
const decodeChargingState = decodeApiResult(ChargingStateSchema);
const decodeDischargingState = decodeApiResult(DischargingStateSchema);

const toTelemetry = (info: ChargingInfo): Telemetry => ({
  simHour: info.sim_time_hour,
  simMinute: info.sim_time_min,
  baseCurrentLoad: info.base_current_load,
  batteryCapacityKwh: info.battery_capacity_kWh,
});

const onOff = (on: boolean) => (on ? 'on' : 'off');

export class HttpSimulationClient implements ISimulationClient {
  public constructor(
    private readonly config: HttpSimulationClientConfig,
    private readonly httpClient: HttpClient.HttpClient,
  ) { }

  public getBaseLoad() {
    return this.call('getBaseLoad', this.httpClient.get(this.url('/baseload')), decodeProfile);
  }

  public getPriceProfile() {
    return this.call('getPriceProfile', this.httpClient.get(this.url('/priceperhour')), decodeProfile);
  }

  public getInfo() {
    return this.call('getInfo', this.httpClient.get(this.url('/info')), decodeChargingInfo).pipe(
      Effect.map(toTelemetry),
    );
  }

  public setDischarge(on: boolean) {
    return this.call(
      'setDischarge',
      this.postJson('/discharge', { discharging: onOff(on) }),
      decodeDischargingState,
    ).pipe(Effect.asVoid);
  }

  public setCharge(on: boolean) {
    return this.call(
      'setCharge',
      this.postJson('/charge', { charging: onOff(on) }),
      decodeChargingState,
    ).pipe(Effect.asVoid);
  }

  private url(path: string) {
    return `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;
  }

  private postJson(path: string, payload: Record<string, string>) {
    return this.httpClient.post(this.url(path), {
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
      body: raw(JSON.stringify(payload)),
    });
  }

  private call<A>(
    operation: string,
    send: Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.HttpClientError>,
    decode: (operation: string, body: unknown) => Either.Either<A, TransportError>,
  ): Effect.Effect<A, TransportError> {
    return Effect.gen(function* () {
      const response = yield* send;
      const text = yield* response.text;

      yield* Effect.logDebug(`Simulation API response for ${operation}`, { status: response.status, body: text });

      const body = yield* Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (cause) => new TransportError({
          reason: 'Malformed',
          operation,
          message: `Response is not JSON (status ${response.status})`,
          cause,
        }),
      });

      if (response.status < 200 || response.status >= 300) {
        return yield* new TransportError({
          reason: 'Rejected',
          operation,
          message: isApiError(body) ? body.error : `Unexpected status ${response.status}`,
        });
      }

      return yield* decode(operation, body);
    }).pipe(
      Effect.timeout(Duration.millis(this.config.timeoutMs)),
      Effect.retry({
        schedule: Schedule.compose(
          Schedule.recurs(this.config.retries),
          Schedule.exponential(RETRY_BASE_DELAY, 2),
        ),
        while: (err) => err._tag === 'TimeoutException' || (err._tag === 'RequestError' && err.reason === 'Transport'),
      }),
      Effect.catchTags({
        TimeoutException: (cause) => Effect.fail(new TransportError({
          reason: 'Timeout',
          operation,
          message: `No response within ${this.config.timeoutMs}ms`,
          cause,
        })),
        RequestError: (cause) => Effect.fail(new TransportError({
          reason: 'Unreachable',
          operation,
          message: 'Could not reach the simulation service. Check if it is running.',
          cause,
        })),
        ResponseError: (cause) => Effect.fail(new TransportError({
          reason: 'Malformed',
          operation,
          message: `Could not read response body: ${cause.message}`,
          cause,
        })),
      }),
      Effect.withSpan(`SimulationClient.${operation}`),
    );
  }
}

export const HttpSimulationClientLayer = Layer.effect(
  SimulationClient,
  Effect.gen(function* () {
    const config = AppConfig.simulationApi;

    return new HttpSimulationClient(
      {
        baseUrl: yield* config.baseUrl,
        timeoutMs: yield* config.timeoutMs,
        retries: yield* config.retries,
      },
      yield* HttpClient.HttpClient,
    );
  })
);
