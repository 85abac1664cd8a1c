import { Config as EffectConfig } from "effect";


export const AppConfig = {
  nrel: {
    apiKey: EffectConfig.redacted("NREL_API_KEY"),
    baseUrl: EffectConfig.string("NREL_API_BASE_URL").pipe(
      EffectConfig.withDefault("https://developer.nrel.gov")
    ),
    endpoint: EffectConfig.string("NREL_API_ENDPOINT").pipe(
      EffectConfig.withDefault("api/solar/solar_resource/v1.json")
    ),
  },

  site: {
    lat: EffectConfig.number("SITE_LAT").pipe(EffectConfig.withDefault(40)),
    lon: EffectConfig.number("SITE_LON").pipe(EffectConfig.withDefault(-105)),
  },
};
