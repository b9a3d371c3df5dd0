/**
 * CLI interface for the flight price tracker
 * Reads the configured searches, runs them and prints one outcome per search
 */

import { readFile } from "node:fs/promises"
import { Schema } from "@effect/schema"
import { Console, Effect, Layer, LogLevel, Logger } from "effect"
import {
  type ExtractionFailure,
  ExtractionOutcomeSchema,
  ExtractionSuccess,
  ScraperErrors,
  SearchSpec,
  SortOptionSchema,
  type ExtractionOutcome,
  type FlightObservation,
  type ObservationFilters,
  type SortOption
} from "../domain"
import {
  ExtractionConfig,
  ExtractionService,
  ExtractionServiceLive,
  PlaywrightSessionLive,
  applyFiltersAndSort,
  browserConfigFromEnv,
  type BrowserConfig,
  type ExtractionOverrides
} from "../services"
import { RateLimiterLive, defaultRateLimiterConfig } from "../utils"

/**
 * CLI Arguments interface
 */
export interface CliArgs {
  searches: string
  json: boolean
  verbose: boolean
  help: boolean
  concurrency?: number
  maxStops?: number
  maxPrice?: number
  maxDuration?: number
  limit?: number
  sort: SortOption
}

const isSortOption = Schema.is(SortOptionSchema)

const parseCount = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined
  const num = parseInt(value, 10)
  return isNaN(num) ? undefined : num
}

const parsePositiveCount = (value: string | undefined): number | undefined => {
  const num = parseCount(value)
  return num !== undefined && num > 0 ? num : undefined
}

/**
 * Parses command-line arguments
 */
export function parseArgs(args: ReadonlyArray<string>): CliArgs {
  const parsed: CliArgs = {
    searches: "searches.json",
    json: false,
    verbose: false,
    help: false,
    sort: "price-asc"
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const nextArg = args[i + 1]

    switch (arg) {
      case "--searches":
      case "-s":
        if (nextArg) parsed.searches = nextArg
        i++
        break
      case "--concurrency":
      case "-c":
        parsed.concurrency = parsePositiveCount(nextArg)
        i++
        break
      case "--max-stops":
        parsed.maxStops = parseCount(nextArg)
        i++
        break
      case "--max-price":
        if (nextArg) {
          const num = parseFloat(nextArg)
          if (num > 0) parsed.maxPrice = num
        }
        i++
        break
      case "--max-duration":
        parsed.maxDuration = parsePositiveCount(nextArg)
        i++
        break
      case "--limit":
      case "-l":
        parsed.limit = parsePositiveCount(nextArg)
        i++
        break
      case "--sort":
        if (nextArg && isSortOption(nextArg)) parsed.sort = nextArg
        i++
        break
      case "--json":
      case "-j":
        parsed.json = true
        break
      case "--verbose":
      case "-v":
        parsed.verbose = true
        break
      case "--help":
      case "-h":
        parsed.help = true
        break
    }
  }

  return parsed
}

const HELP = `
Flight Price Tracker - CLI

Usage:
  flight-tracker [options]

Options:
  --searches, -s <file>       JSON array of searches (default: searches.json)
  --concurrency, -c <number>  Searches run in parallel (default: EXTRACTION_CONCURRENCY or 1)
  --max-stops <number>        Only show observations with at most this many stops
  --max-price <number>        Only show observations up to this price
  --max-duration <minutes>    Only show observations of a known duration up to this long
  --limit, -l <number>        Observations shown per search
  --sort <option>             price-asc, price-desc, duration-asc, duration-desc, departure,
                              carrier, none (default: price-asc)
  --json, -j                  Output outcomes as JSON
  --verbose, -v               Debug logging
  --help, -h                  Show this help message

Environment:
  BROWSER_EXECUTABLE_PATH     Chromium binary to drive (required)
  BROWSER_HEADLESS            false to watch the browser work
  EXTRACTION_*                Timeouts, retries and expansion limits

Example searches.json:
  [{ "origin": "VIE", "destination": "LHR", "earliest_departure": "2026-03-01",
     "latest_return": "2026-03-10", "min_stay_days": 3, "max_stay_days": 7 }]
`

const SearchesFromJson = Schema.parseJson(Schema.Array(SearchSpec))

/**
 * Reads and validates the searches file
 */
export const loadSearches = (path: string) =>
  Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: (error) => ScraperErrors.invalidInput(path, String(error))
  }).pipe(
    Effect.flatMap((text) =>
      Schema.decodeUnknown(SearchesFromJson)(text).pipe(
        Effect.mapError((error) => ScraperErrors.invalidInput(path, error.message))
      )
    )
  )

/**
 * Observation filters taken from the command line
 */
export const filtersFromArgs = (args: CliArgs): ObservationFilters => ({
  maxStops: args.maxStops,
  maxPrice: args.maxPrice,
  maxDurationMinutes: args.maxDuration,
  limit: args.limit
})

/**
 * Applies display filters to the observations of successful outcomes
 */
export const presentOutcome = (outcome: ExtractionOutcome, args: CliArgs): ExtractionOutcome =>
  outcome._tag === "Failure"
    ? outcome
    : new ExtractionSuccess({
        search_id: outcome.search_id,
        observations: applyFiltersAndSort(outcome.observations, filtersFromArgs(args), args.sort),
        stats: outcome.stats
      })

/**
 * 0 when at least one search succeeded (or nothing was configured), 1 otherwise
 */
export const exitCodeFor = (outcomes: ReadonlyArray<ExtractionOutcome>): number =>
  outcomes.length === 0 || outcomes.some((outcome) => outcome._tag === "Success") ? 0 : 1

const formatDuration = (minutes: number): string =>
  `${Math.floor(minutes / 60)} hr ${minutes % 60} min`

/**
 * Formats one observation for display
 */
export function formatObservation(observation: FlightObservation, index: number): string {
  const stopsText = observation.stops === 0 ? "Nonstop" : `${observation.stops} stop${observation.stops > 1 ? "s" : ""}`
  const dates = observation.return_date
    ? `${observation.departure_date} → ${observation.return_date}`
    : observation.departure_date
  const details = [dates, stopsText]
  if (observation.duration_minutes !== undefined) {
    details.push(formatDuration(observation.duration_minutes))
  }
  details.push(`${observation.price.amount.toFixed(2)} ${observation.price.currency}`)

  return `${index + 1}. ${observation.carrier}
   ${details.join(" | ")}`
}

const formatFailure = (failure: ExtractionFailure): string =>
  `❌ ${failure.search_id}: ${failure.kind} after ${failure.attempts} attempt(s) (last phase: ${failure.phase})
   ${failure.message.split("\n")[0]}`

const printOutcome = (outcome: ExtractionOutcome) =>
  Effect.gen(function* () {
    if (outcome._tag === "Failure") {
      yield* Console.error(formatFailure(outcome))
      return
    }
    const { stats } = outcome
    yield* Console.log(
      `✅ ${outcome.search_id}: ${outcome.observations.length} shown (${stats.entries} entries, ${stats.skipped} skipped, ${stats.duplicates} duplicates)`
    )
    for (const [i, observation] of outcome.observations.entries()) {
      yield* Console.log(formatObservation(observation, i))
    }
    yield* Console.log("")
  })

/**
 * Main CLI program
 */
export const cliProgram = (args: CliArgs, signal: AbortSignal) =>
  Effect.gen(function* () {
    const specs = yield* loadSearches(args.searches)

    if (!args.json) {
      yield* Console.log(`🛫 Tracking ${specs.length} search(es) from ${args.searches}\n`)
    }

    const tracker = yield* ExtractionService
    const outcomes = (yield* tracker.runAll(specs, { signal })).map((outcome) => presentOutcome(outcome, args))

    if (args.json) {
      const encoded = yield* Schema.encode(Schema.Array(ExtractionOutcomeSchema))(outcomes).pipe(
        Effect.mapError((error) => ScraperErrors.invalidInput("outcomes", error.message))
      )
      yield* Console.log(JSON.stringify(encoded, null, 2))
    } else {
      for (const outcome of outcomes) {
        yield* printOutcome(outcome)
      }
    }

    return outcomes
  })

/**
 * Creates the Layer for CLI execution
 */
export const createCliLayer = (browser: BrowserConfig, overrides: ExtractionOverrides) =>
  ExtractionServiceLive.pipe(
    Layer.provide(PlaywrightSessionLive(browser)),
    Layer.provide(ExtractionConfig.fromEnv(overrides)),
    Layer.provide(RateLimiterLive(defaultRateLimiterConfig))
  )

/**
 * Runs the CLI program
 */
export const runCli = (argv: ReadonlyArray<string> = process.argv.slice(2)) => {
  const args = parseArgs(argv)
  if (args.help) {
    console.log(HELP)
    return Promise.resolve()
  }

  // Ctrl-C cancels the running searches; the browser is closed on the way out
  const controller = new AbortController()
  const abort = () => controller.abort(new Error("interrupted"))
  process.once("SIGINT", abort)
  process.once("SIGTERM", abort)

  const overrides: ExtractionOverrides = args.concurrency !== undefined ? { concurrency: args.concurrency } : {}

  const program = Effect.gen(function* () {
    const browser = yield* browserConfigFromEnv
    return yield* cliProgram(args, controller.signal).pipe(Effect.provide(createCliLayer(browser, overrides)))
  }).pipe(
    Logger.withMinimumLogLevel(args.verbose ? LogLevel.Debug : LogLevel.Warning),
    Effect.match({
      onFailure: (error) => {
        console.error("\n--- ERROR ---")
        console.error(error._tag === "ScraperError" ? error.message : String(error))
        process.exit(1)
      },
      onSuccess: (outcomes) => {
        if (!args.json) {
          console.log("--- COMPLETE ---")
        }
        process.exit(exitCodeFor(outcomes))
      }
    })
  )

  return Effect.runPromise(program)
}
