import { NrelSolarResourceLayer } from "./solar-resource/nrel.adapter.js";
import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";

export const serviceLayers = Layer.mergeAll(
    Layer.unwrapEffect(
        Effect.gen(function* () {
            return NrelSolarResourceLayer({
                baseUrl: yield* AppConfig.nrel.baseUrl,
            });
        })
    ),
);
