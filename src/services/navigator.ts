/**
 * Drives the browser to a search query and brings the full result list on screen
 */

import { Duration, Effect, Option, Schedule } from "effect"
import { ScraperErrors, type ExtractionPhase, type ScraperError, type SearchQuery, type SearchSpec } from "../domain"
import { fromEpochDay, toEpochDay } from "../utils/dates"
import { RateLimiterService } from "../utils/rate-limiter"
import { ExtractionConfig, type ExtractionSettings } from "./config"
import type { LocatorRule } from "./locators"
import { firstMatching, isPresent, type SessionHandle } from "./session"
import { resolveUiState } from "./ui-state"

const GROWTH_POLL_MS = 250

/**
 * Builds the natural-language query URL, e.g.
 * `?q=Flights+to+LHR+from+VIE+on+2026-03-01+return+2026-03-04&hl=en`
 */
export const buildSearchUrl = (
  spec: SearchSpec,
  query: SearchQuery,
  settings: Pick<ExtractionSettings, "baseUrl" | "language" | "currency">
): string => {
  const q = query.return_date === undefined
    ? `Flights to ${spec.destination} from ${spec.origin} on ${query.departure_date} oneway`
    : `Flights to ${spec.destination} from ${spec.origin} on ${query.departure_date} return ${query.return_date}`

  const params = new URLSearchParams({ q, hl: settings.language })
  if (settings.currency) params.set("curr", settings.currency)
  return `${settings.baseUrl}?${params.toString()}`
}

/**
 * Date pairs to load for a search, earliest departure and shortest stay first.
 * Only pairs that return by `latest_return` are planned.
 */
export const planQueries = (
  spec: SearchSpec,
  settings: Pick<ExtractionSettings, "maxQueriesPerSearch" | "dateStepDays">
): ReadonlyArray<SearchQuery> => {
  const max = Math.max(1, settings.maxQueriesPerSearch)
  const step = Math.max(1, settings.dateStepDays)
  const last = toEpochDay(spec.latest_return)
  const queries: SearchQuery[] = []

  for (let day = toEpochDay(spec.earliest_departure); day <= last && queries.length < max; day += step) {
    const departure_date = fromEpochDay(day)
    if (spec.one_way) {
      queries.push({ departure_date, return_date: undefined })
      continue
    }
    for (let stay = spec.min_stay_days; stay <= spec.max_stay_days && queries.length < max; stay++) {
      if (day + stay > last) break
      queries.push({ departure_date, return_date: fromEpochDay(day + stay) })
    }
  }
  return queries
}

/**
 * Number of matches of the first rule that matches anything
 */
export const countEntries = (handle: SessionHandle, rules: ReadonlyArray<LocatorRule>) =>
  Effect.reduce(rules, 0, (found, rule) => (found > 0 ? Effect.succeed(found) : handle.count(rule)))

/**
 * Loads the query page, paced by the rate limiter
 */
export const loadQuery = (handle: SessionHandle, spec: SearchSpec, query: SearchQuery) =>
  Effect.gen(function* () {
    const settings = yield* ExtractionConfig
    const rateLimiter = yield* RateLimiterService
    const url = buildSearchUrl(spec, query, settings)

    yield* rateLimiter.acquire()
    yield* Effect.logDebug(`Loading ${url}`)
    yield* handle.goto(url, settings.navigationTimeoutMs)
  })

/**
 * Waits for the result list or the "no results" marker.
 * Resolves to whether a result list is showing.
 */
export const awaitResults = (handle: SessionHandle) =>
  Effect.gen(function* () {
    const { locators, resultsTimeoutMs } = yield* ExtractionConfig

    const settled = yield* handle.waitFor(
      [...locators.resultsContainer, ...locators.noResults],
      "present",
      resultsTimeoutMs
    )
    if (!settled) {
      return yield* ScraperErrors.navigationTimeout("waiting for the result list", resultsTimeoutMs)
    }
    return yield* isPresent(handle, locators.resultsContainer)
  })

/** Click errors an optional step logs and gets past */
const isClickFailure = (error: ScraperError) =>
  error.reason === "NavigationFailed" || error.reason === "NavigationTimeout"

/**
 * Switches the list to the cheapest-first tab. A missing or unclickable tab
 * is not an error.
 */
export const sortByCheapest = (handle: SessionHandle) =>
  Effect.gen(function* () {
    const { locators, settleMs, overlayTimeoutMs } = yield* ExtractionConfig
    const tab = yield* firstMatching(handle, locators.cheapestTab)
    if (Option.isNone(tab)) {
      yield* Effect.logWarning("Could not find the 'Cheapest' tab")
      return false
    }
    yield* handle.click(tab.value, overlayTimeoutMs)
    yield* Effect.sleep(Duration.millis(settleMs))
    return true
  }).pipe(
    Effect.catchIf(
      isClickFailure,
      (error) => Effect.logWarning(`Could not click the 'Cheapest' tab: ${error.message}`).pipe(Effect.as(false))
    )
  )

const waitForGrowth = (handle: SessionHandle, rules: ReadonlyArray<LocatorRule>, before: number, timeoutMs: number) =>
  countEntries(handle, rules).pipe(
    Effect.repeat({
      schedule: Schedule.spaced(Duration.millis(GROWTH_POLL_MS)),
      until: (count) => count > before
    }),
    Effect.timeoutOption(Duration.millis(timeoutMs)),
    Effect.map(Option.isSome)
  )

/**
 * Clicks "more flights" until the list stops growing or `maxExpansions` is
 * reached. A missing or unclickable control ends the expansion early.
 * Returns the number of clicks made.
 */
export const expandResults = (handle: SessionHandle) =>
  Effect.gen(function* () {
    const { locators, maxExpansions, expansionTimeoutMs } = yield* ExtractionConfig
    let expansions = 0

    while (expansions < maxExpansions) {
      const control = yield* firstMatching(handle, locators.showMore)
      if (Option.isNone(control)) break

      const before = yield* countEntries(handle, locators.resultItem)
      const clicked = yield* handle.click(control.value, expansionTimeoutMs).pipe(
        Effect.as(true),
        Effect.catchIf(isClickFailure, (error) =>
          Effect.logWarning(`Could not click 'more flights': ${error.message}`).pipe(Effect.as(false))
        )
      )
      if (!clicked) break
      expansions++

      const grew = yield* waitForGrowth(handle, locators.resultItem, before, expansionTimeoutMs)
      // overlays like to come back after interactions
      yield* resolveUiState(handle)
      if (!grew) {
        yield* Effect.logDebug(`Result list stopped growing at ${before} entries`)
        break
      }
    }

    if (expansions === maxExpansions) {
      yield* Effect.logDebug(`Stopped expanding after ${maxExpansions} clicks`)
    }
    return expansions
  })

/**
 * Loads a query and prepares the result list for extraction:
 * load → resolve overlays → wait for results → (sort) → expand.
 * Without a query the first planned date pair is loaded. `track` is told
 * about each phase reached. Resolves to whether results exist.
 */
export const navigate = (
  handle: SessionHandle,
  spec: SearchSpec,
  query?: SearchQuery,
  track: (phase: ExtractionPhase) => Effect.Effect<void> = () => Effect.void
): Effect.Effect<boolean, ScraperError, ExtractionConfig | RateLimiterService> =>
  Effect.gen(function* () {
    const settings = yield* ExtractionConfig
    const [planned] = planQueries(spec, settings)
    const target = query ?? planned
    if (target === undefined) {
      return yield* ScraperErrors.invalidInput(spec.id, "no date pair fits the search window")
    }

    yield* loadQuery(handle, spec, target)
    yield* track("Navigated")

    yield* resolveUiState(handle, { afterLoad: true })
    yield* track("UIResolved")

    const hasResults = yield* awaitResults(handle)
    if (hasResults) {
      if (settings.sortByCheapest) {
        yield* sortByCheapest(handle)
        yield* resolveUiState(handle)
      }
      yield* expandResults(handle)
    }
    yield* track("ResultsReady")
    return hasResults
  }).pipe(
    Effect.annotateLogs({ departure: query?.departure_date ?? spec.earliest_departure })
  )
