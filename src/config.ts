import { Config as EffectConfig } from "effect";
import { isTimeZone } from "./statistics/windows.js";


export const AppConfig = {
  priceApi: {
    url: EffectConfig.string("PRICES_API_URL").pipe(
      EffectConfig.withDefault("https://frank-graphql-prod.graphcdn.app/")
    ),
    timeoutMs: EffectConfig.integer("PRICES_API_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(10_000)
    ),
  },

  coordinator: {
    refreshIntervalMinutes: EffectConfig.integer("REFRESH_INTERVAL_MINUTES").pipe(
      EffectConfig.withDefault(60)
    ),
    stalenessFactor: EffectConfig.number("STALENESS_FACTOR").pipe(
      EffectConfig.withDefault(2)
    ),
    // Day-ahead prices are usually published shortly after noon CET
    tomorrowPublicationHourUtc: EffectConfig.integer("TOMORROW_PUBLICATION_HOUR_UTC").pipe(
      EffectConfig.withDefault(13)
    ),
    timeZone: EffectConfig.string("PRICES_TIME_ZONE").pipe(
      EffectConfig.validate({
        message: "Expected an IANA time zone such as Europe/Amsterdam",
        validation: isTimeZone,
      }),
      EffectConfig.withDefault("Europe/Amsterdam")
    ),
    retryAttempts: EffectConfig.integer("REFRESH_RETRY_ATTEMPTS").pipe(
      EffectConfig.withDefault(3)
    ),
    retryBaseDelayMs: EffectConfig.integer("REFRESH_RETRY_BASE_DELAY_MS").pipe(
      EffectConfig.withDefault(2_000)
    ),
  },

  sensors: {
    displayOptions: EffectConfig.array(EffectConfig.string(), "DISPLAY_OPTIONS").pipe(
      EffectConfig.withDefault<ReadonlyArray<string>>([])
    ),
  },
};
