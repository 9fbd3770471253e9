import { Layer } from "effect";
import { HttpSimulationClientLayer } from "./simulation-client/http-simulation-client.js";
import { LoggingPresentationSinkLayer } from "./presentation-sink/logging-presentation-sink.js";

export const serviceLayers = Layer.mergeAll(
    HttpSimulationClientLayer,
    LoggingPresentationSinkLayer,
);
