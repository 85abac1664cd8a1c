import { describe, it, expect } from "@effect/vitest";
import { ConfigProvider, Effect, Exit, Redacted } from "effect";
import { AppConfig } from "../../config.js";

const withEnv = (env: Record<string, string>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))));

describe("AppConfig", () => {
  it.effect("should fall back to defaults for everything but the API key", () =>
    Effect.gen(function* () {
      expect(yield* AppConfig.nrel.baseUrl).toBe("https://developer.nrel.gov");
      expect(yield* AppConfig.nrel.endpoint).toBe("api/solar/solar_resource/v1.json");
      expect(yield* AppConfig.site.lat).toBe(40);
      expect(yield* AppConfig.site.lon).toBe(-105);
    }).pipe(withEnv({ NREL_API_KEY: "test-api-key" }))
  );

  it.effect("should keep the API key redacted until unwrapped", () =>
    Effect.gen(function* () {
      const apiKey = yield* AppConfig.nrel.apiKey;

      expect(String(apiKey)).toBe("<redacted>");
      expect(Redacted.value(apiKey)).toBe("test-api-key");
    }).pipe(withEnv({ NREL_API_KEY: "test-api-key" }))
  );

  it.effect("should read site coordinates as numbers", () =>
    Effect.gen(function* () {
      expect(yield* AppConfig.site.lat).toBe(39.74);
      expect(yield* AppConfig.site.lon).toBe(-105.17);
    }).pipe(withEnv({ SITE_LAT: "39.74", SITE_LON: "-105.17" }))
  );

  it.effect("should fail when the API key is missing", () =>
    Effect.gen(function* () {
      const result = yield* Effect.exit(AppConfig.nrel.apiKey);

      expect(Exit.isFailure(result)).toBe(true);
    }).pipe(withEnv({}))
  );
});
