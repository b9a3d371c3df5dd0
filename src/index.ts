/**
 * Flight Price Tracker - Main exports
 *
 * Drives a flight-search page with a scripted browser and returns one
 * outcome per configured search.
 *
 * @example
 * ```typescript
 * import { Effect, Layer } from "effect"
 * import { ExtractionConfig, ExtractionService, ExtractionServiceLive, PlaywrightSessionLive, RateLimiterLive, defaultBrowserConfig } from "flight-price-tracker"
 *
 * const program = Effect.gen(function* () {
 *   const tracker = yield* ExtractionService
 *   const outcome = yield* tracker.run(search)
 *   if (outcome._tag === "Success") console.log(`Found ${outcome.observations.length} prices`)
 * })
 *
 * const live = ExtractionServiceLive.pipe(
 *   Layer.provide(PlaywrightSessionLive({ ...defaultBrowserConfig, executablePath: "/usr/bin/chromium" })),
 *   Layer.provide(ExtractionConfig.layer()),
 *   Layer.provide(RateLimiterLive())
 * )
 * Effect.runPromise(program.pipe(Effect.provide(live)))
 * ```
 */

// Domain exports
export * from "./domain"

// Service exports
export * from "./services"

// Utility exports
export * from "./utils"
