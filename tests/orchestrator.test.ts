/**
 * Tests for the extraction orchestrator: outcomes, retries, session lifecycle
 * and cancellation, all against the in-memory session.
 */

import { Effect, Layer } from "effect"
import { describe, expect, test } from "vitest"
import { ScraperErrors, SearchSpec, isWithinSearchWindow, type ExtractionOutcome } from "../src/domain"
import type { ExtractionOverrides } from "../src/services/config"
import { ExtractionService, ExtractionServiceLive, type RunOptions } from "../src/services/orchestrator"
import { makeFakeSession, type FakeSessionOptions } from "./support/fake-session"
import { testLayer } from "./support/harness"
import { CONSENT_OVERLAY, STUCK_CONSENT_OVERLAY, entry, resultPage, viennaLondon } from "./support/pages"

const viennaParis = new SearchSpec({
  origin: "VIE",
  destination: "CDG",
  earliest_departure: "2026-04-01",
  latest_return: "2026-04-15",
  min_stay_days: 2,
  max_stay_days: 5
})

const austrian = entry({ price: "€120.50", carrier: "Austrian", stops: "Nonstop", departure: "2026-03-02", returnDate: "2026-03-06" })
const airFrance = entry({ price: "€89", carrier: "Air France", stops: "1 stop", departure: "2026-04-01", returnDate: "2026-04-03" })

const runAll = (
  options: FakeSessionOptions,
  specs: ReadonlyArray<SearchSpec>,
  overrides: ExtractionOverrides = {},
  runOptions: RunOptions = {}
) => {
  const fake = makeFakeSession(options)
  const program = Effect.gen(function* () {
    const service = yield* ExtractionService
    return yield* service.runAll(specs, runOptions)
  }).pipe(Effect.provide(ExtractionServiceLive.pipe(Layer.provide(testLayer(fake, overrides)))))
  return { fake, outcomes: Effect.runPromise(program) }
}

const success = (outcome: ExtractionOutcome | undefined) => {
  if (outcome?._tag !== "Success") throw new Error(`expected Success, got ${JSON.stringify(outcome)}`)
  return outcome
}

const failure = (outcome: ExtractionOutcome | undefined) => {
  if (outcome?._tag !== "Failure") throw new Error(`expected Failure, got ${outcome?._tag}`)
  return outcome
}

describe("ExtractionService", () => {
  test("returns exactly the one rendered observation", async () => {
    const { fake, outcomes } = runAll({ page: () => resultPage({ entries: [austrian] }) }, [viennaLondon])

    const [outcome] = await outcomes
    const result = success(outcome)

    expect(result.search_id).toBe(viennaLondon.id)
    expect(result.observations).toHaveLength(1)
    const [observation] = result.observations
    expect(observation.departure_date).toBe("2026-03-02")
    expect(observation.return_date).toBe("2026-03-06")
    expect(observation.price).toEqual({ amount: 120.5, currency: "EUR" })
    expect(observation.carrier).toBe("Austrian")
    expect(observation.stops).toBe(0)
    expect(result.stats).toEqual({ queries: 1, entries: 1, skipped: 0, out_of_window: 0, duplicates: 0 })
    expect(fake.log).toMatchObject({ acquired: 1, released: 1, resets: 0 })
  })

  test("a consent dialog on first load is dismissed without a retry", async () => {
    const { fake, outcomes } = runAll(
      { page: () => resultPage({ entries: [austrian], overlays: [CONSENT_OVERLAY] }) },
      [viennaLondon]
    )

    const [outcome] = await outcomes

    expect(success(outcome).observations).toHaveLength(1)
    expect(fake.log.visits).toHaveLength(1)
    expect(fake.log.resets).toBe(0)
  })

  test("an overlay that never goes away fails that search after three attempts only", async () => {
    const { fake, outcomes } = runAll(
      {
        page: (url) =>
          url.includes("LHR")
            ? resultPage({ entries: [austrian], overlays: [STUCK_CONSENT_OVERLAY] })
            : resultPage({ entries: [airFrance] })
      },
      [viennaLondon, viennaParis]
    )

    const [london, paris] = await outcomes
    const blocked = failure(london)

    expect(blocked.kind).toBe("BlockingUIFailure")
    expect(blocked.attempts).toBe(3)
    expect(blocked.phase).toBe("Navigated")
    expect(success(paris).observations.map((o) => o.carrier)).toEqual(["Air France"])
    expect(fake.log.resets).toBe(2)
    expect(fake.log.visits.filter((url) => url.includes("LHR"))).toHaveLength(3)
    expect(fake.log.released).toBe(2)
  })

  test("retries a failed page load on the same session after a reset", async () => {
    const { fake, outcomes } = runAll(
      {
        page: (_url, visit) =>
          visit === 1
            ? ScraperErrors.navigationFailed("loading the page", "net::ERR_CONNECTION_RESET")
            : resultPage({ entries: [austrian] })
      },
      [viennaLondon]
    )

    const [outcome] = await outcomes

    expect(success(outcome).observations).toHaveLength(1)
    expect(fake.log).toMatchObject({ acquired: 1, released: 1, resets: 1 })
  })

  test("optional clicks that time out leave the ready result list alone", async () => {
    const { fake, outcomes } = runAll(
      {
        page: () => resultPage({ entries: [austrian], cheapestTab: true, showMore: true }),
        clickFails: (selector) =>
          selector === "#M7sBEb" || selector === "li.ZVk93d"
            ? ScraperErrors.navigationTimeout("clicking", 50)
            : undefined
      },
      [viennaLondon],
      { sortByCheapest: true }
    )

    const [outcome] = await outcomes
    const result = success(outcome)

    expect(result.observations.map((o) => o.carrier)).toEqual(["Austrian"])
    expect(result.stats).toEqual({ queries: 1, entries: 1, skipped: 0, out_of_window: 0, duplicates: 0 })
    expect(fake.log.visits).toHaveLength(1)
    expect(fake.log.resets).toBe(0)
  })

  test("does not retry a page whose entries cannot be parsed", async () => {
    const { fake, outcomes } = runAll(
      { page: () => resultPage({ entries: [entry({ carrier: "Austrian" })] }) },
      [viennaLondon]
    )

    const [outcome] = await outcomes
    const result = failure(outcome)

    expect(result.kind).toBe("ExtractionIntegrityFailure")
    expect(result.attempts).toBe(1)
    expect(result.phase).toBe("ResultsReady")
    expect(fake.log.visits).toHaveLength(1)
  })

  test("a browser that cannot start fails the remaining searches without attempting them", async () => {
    const { outcomes } = runAll({ page: () => "", launchFails: true }, [viennaLondon, viennaParis])

    const [first, second] = await outcomes

    expect(failure(first)).toMatchObject({ kind: "SessionStartFailure", attempts: 1, phase: "Idle" })
    expect(failure(second)).toMatchObject({
      search_id: viennaParis.id,
      kind: "SessionStartFailure",
      attempts: 0,
      phase: "Idle"
    })
  })

  test("merges planned queries and drops what falls outside the window", async () => {
    const late = entry({ price: "€60", carrier: "Wizz Air", departure: "2026-03-12", returnDate: "2026-03-15" })
    const { fake, outcomes } = runAll(
      { page: () => resultPage({ entries: [austrian, late] }) },
      [viennaLondon],
      { maxQueriesPerSearch: 2 }
    )

    const [outcome] = await outcomes
    const result = success(outcome)

    expect(fake.log.visits).toHaveLength(2)
    expect(result.stats).toEqual({ queries: 2, entries: 4, skipped: 0, out_of_window: 2, duplicates: 1 })
    expect(result.observations.map((o) => o.carrier)).toEqual(["Austrian"])
    for (const observation of result.observations) {
      expect(isWithinSearchWindow(viennaLondon, observation)).toBe(true)
    }
    expect(new Set(result.observations.map((o) => o.raw_fingerprint)).size).toBe(result.observations.length)
  })

  test("runs searches side by side and keeps their order", async () => {
    const { fake, outcomes } = runAll(
      {
        page: (url) => resultPage({ entries: [url.includes("LHR") ? austrian : airFrance] }),
        gotoDelayMs: 20
      },
      [viennaLondon, viennaParis],
      { concurrency: 2 }
    )

    const [london, paris] = await outcomes

    expect(success(london).search_id).toBe(viennaLondon.id)
    expect(success(paris).search_id).toBe(viennaParis.id)
    expect(fake.log).toMatchObject({ acquired: 2, released: 2 })
  })

  test("cancellation interrupts the running search and releases its session", async () => {
    const controller = new AbortController()
    const { fake, outcomes } = runAll(
      { page: () => resultPage({ entries: [austrian] }), gotoDelayMs: 10_000 },
      [viennaLondon, viennaParis],
      {},
      { signal: controller.signal }
    )
    setTimeout(() => controller.abort(new Error("stop requested")), 20)

    const [running, waiting] = await outcomes

    expect(failure(running)).toMatchObject({
      kind: "Cancelled",
      message: "Extraction cancelled: stop requested",
      attempts: 1,
      phase: "SessionAcquired"
    })
    expect(failure(waiting)).toMatchObject({ kind: "Cancelled", attempts: 0, phase: "Idle" })
    expect(fake.log).toMatchObject({ acquired: 1, released: 1 })
  })

  test("run handles a single search", async () => {
    const fake = makeFakeSession({ page: () => resultPage({ entries: [austrian] }) })
    const outcome = await Effect.gen(function* () {
      const service = yield* ExtractionService
      return yield* service.run(viennaLondon)
    }).pipe(Effect.provide(ExtractionServiceLive.pipe(Layer.provide(testLayer(fake)))), Effect.runPromise)

    expect(success(outcome).observations).toHaveLength(1)
  })
})
