import { Effect, Layer, Option, Schema } from "effect";
import { Headers, HttpClient } from "@effect/platform";
import { STATUS_CODES } from "node:http";
import { SolarResourcePayloadSchema, type SolarResourcePayload } from "./schema.js";
import {
  ApiNotReachableError,
  ContentTypeMismatchError,
  HttpFailureError,
  MalformedPayloadError,
  MONTHS,
  SolarResource,
  type SolarResourceError,
  type SolarResourceQueries,
  type SolarResourceTable,
} from "./types.js";

export type NrelConfig = {
  readonly baseUrl: string;
};

export const joinUrl = (baseUrl: string, endpoint: string): string =>
  `${baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

const toTable = (payload: SolarResourcePayload): SolarResourceTable => {
  const { avg_dni, avg_ghi, avg_lat_tilt } = payload.outputs;

  return MONTHS.map((month, index) => ({
    month,
    avg_dni: avg_dni.monthly[index],
    avg_ghi: avg_ghi.monthly[index],
    avg_lat_tilt: avg_lat_tilt.monthly[index],
  }));
};

export const NrelSolarResourceLayer = (
  config: NrelConfig
): Layer.Layer<SolarResource, never, HttpClient.HttpClient> =>
  Layer.effect(
    SolarResource,
    Effect.gen(function* () {
      const httpClient = yield* HttpClient.HttpClient;

      const fetchTable = (
        endpoint: string,
        queries: SolarResourceQueries
      ): Effect.Effect<SolarResourceTable, SolarResourceError> =>
        Effect.gen(function* () {
          const response = yield* httpClient.get(joinUrl(config.baseUrl, endpoint), {
            urlParams: queries,
          });

          yield* Effect.logDebug(`Solar Resource API responded with status ${response.status}`);

          if (!isSuccessStatus(response.status)) {
            const statusText = STATUS_CODES[response.status] ?? "Unknown Status";
            return yield* new HttpFailureError({
              message: `Solar Resource API returned status ${response.status} ${statusText}`,
              status: response.status,
              statusText,
            });
          }

          const contentType = Headers.get(response.headers, "content-type").pipe(
            Option.getOrElse(() => "")
          );
          if (!contentType.toLowerCase().includes("json")) {
            return yield* new ContentTypeMismatchError({ contentType });
          }

          const body = yield* response.text;
          const payload = yield* Schema.decodeUnknown(
            Schema.parseJson(SolarResourcePayloadSchema)
          )(body).pipe(
            Effect.mapError(
              (error) =>
                new MalformedPayloadError({
                  message: `Unrecognized payload from Solar Resource API: ${error.message}`,
                  cause: error,
                })
            )
          );

          return toTable(payload);
        }).pipe(
          Effect.catchTag("RequestError", () => Effect.fail(new ApiNotReachableError())),
          Effect.catchTag("ResponseError", () => Effect.fail(new ApiNotReachableError())),
        );

      return SolarResource.of({
        fetchTable,
      });
    })
  );
