import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Logger, LogLevel, Redacted, Schema } from "effect"
import { AppConfig } from './config.js';
import { SolarResource } from './solar-resource/types.js';
import { SolarColumnSchema } from './solar-resource/schema.js';
import { formatSeries, toSeries } from './solar-resource/series.js';
import { serviceLayers } from './layers.js';

const isProd = process.env.NODE_ENV == 'production';

const columnArg = process.argv
  .find((arg) => arg.startsWith('--column='))
  ?.slice('--column='.length) ?? 'avg_dni';

const program = Effect.gen(function*() {
  const column = yield* Schema.decodeUnknown(SolarColumnSchema)(columnArg);
  const endpoint = yield* AppConfig.nrel.endpoint;

  const solarResource = yield* SolarResource;
  const table = yield* solarResource.fetchTable(endpoint, {
    api_key: Redacted.value(yield* AppConfig.nrel.apiKey),
    lat: yield* AppConfig.site.lat,
    lon: yield* AppConfig.site.lon,
  });

  yield* Console.table(table);
  yield* Effect.log(`${column} by month: ${formatSeries(toSeries(table, column))}`);
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeHttpClient.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
