/**
 * Tests for CLI argument parsing, searches loading and output helpers.
 */

import { mkdtemp, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Cause, Effect, Exit, Option } from "effect"
import { describe, expect, test } from "vitest"
import { exitCodeFor, formatObservation, loadSearches, parseArgs, presentOutcome } from "../src/cli/index"
import { ExtractionFailure, ExtractionSuccess, FlightObservation } from "../src/domain"
import { createFingerprint } from "../src/services/parsing"
import { viennaLondon } from "./support/pages"

const observation = (carrier: string, amount: number, stops: number, duration_minutes?: number) =>
  new FlightObservation({
    search_id: viennaLondon.id,
    observed_at: new Date("2026-02-01T00:00:00Z"),
    departure_date: "2026-03-02",
    return_date: "2026-03-06",
    price: { amount, currency: "EUR" },
    carrier,
    stops,
    duration_minutes,
    raw_fingerprint: createFingerprint(carrier, "2026-03-02", "2026-03-06", { amount, currency: "EUR" })
  })

const stats = { queries: 1, entries: 3, skipped: 0, out_of_window: 0, duplicates: 0 }

const blocked = new ExtractionFailure({
  search_id: viennaLondon.id,
  kind: "BlockingUIFailure",
  message: "stuck",
  attempts: 3,
  phase: "Navigated"
})

const writeSearches = async (content: string) => {
  const dir = await mkdtemp(join(tmpdir(), "flight-tracker-"))
  const path = join(dir, "searches.json")
  await writeFile(path, content)
  return path
}

describe("parseArgs", () => {
  test("uses defaults without arguments", () => {
    expect(parseArgs([])).toEqual({ searches: "searches.json", json: false, verbose: false, help: false, sort: "price-asc" })
  })

  test("reads every option", () => {
    const args = parseArgs(["--searches", "mine.json", "-j", "-c", "3", "--max-stops", "1", "--max-price", "150.5", "-l", "5", "--sort", "departure", "-v"])
    expect(args).toEqual({
      searches: "mine.json",
      json: true,
      verbose: true,
      help: false,
      concurrency: 3,
      maxStops: 1,
      maxPrice: 150.5,
      limit: 5,
      sort: "departure"
    })
  })

  test("ignores unknown sort options and bad numbers", () => {
    const args = parseArgs(["--sort", "cheapest", "--limit", "many"])
    expect(args.sort).toBe("price-asc")
    expect(args.limit).toBeUndefined()
  })

  test("ignores counts that are not positive", () => {
    const args = parseArgs(["--limit", "0", "--concurrency", "-2", "--max-duration", "0", "--max-price", "0"])
    expect(args.limit).toBeUndefined()
    expect(args.concurrency).toBeUndefined()
    expect(args.maxDuration).toBeUndefined()
    expect(args.maxPrice).toBeUndefined()
  })

  test("reads the duration limit and duration sorts", () => {
    const args = parseArgs(["--max-duration", "180", "--sort", "duration-desc"])
    expect(args.maxDuration).toBe(180)
    expect(args.sort).toBe("duration-desc")
  })
})

describe("loadSearches", () => {
  test("decodes a valid searches file", async () => {
    const path = await writeSearches(JSON.stringify([
      { origin: "VIE", destination: "LHR", earliest_departure: "2026-03-01", latest_return: "2026-03-10", min_stay_days: 3, max_stay_days: 7 }
    ]))

    const specs = await Effect.runPromise(loadSearches(path))

    expect(specs.map((spec) => spec.id)).toEqual(["VIE-LHR:2026-03-01..2026-03-10:3-7"])
  })

  test("rejects a file that breaks the schema", async () => {
    const path = await writeSearches(JSON.stringify([{ origin: "VIE", destination: "LHR" }]))

    const exit = await Effect.runPromiseExit(loadSearches(path))

    expect(Exit.isFailure(exit)).toBe(true)
    if (Exit.isFailure(exit)) {
      expect(Option.map(Cause.failureOption(exit.cause), (e) => e.reason)).toEqual(Option.some("InvalidInput"))
    }
  })

  test("rejects a file that is not JSON", async () => {
    const path = await writeSearches("not json")
    const exit = await Effect.runPromiseExit(loadSearches(path))
    expect(Exit.isFailure(exit)).toBe(true)
  })
})

describe("output helpers", () => {
  test("formats an observation", () => {
    expect(formatObservation(observation("Austrian", 120.5, 0), 0)).toBe(
      "1. Austrian\n   2026-03-02 → 2026-03-06 | Nonstop | 120.50 EUR"
    )
    expect(formatObservation(observation("Lufthansa", 99, 2), 4)).toBe(
      "5. Lufthansa\n   2026-03-02 → 2026-03-06 | 2 stops | 99.00 EUR"
    )
  })

  test("shows the duration when it is known", () => {
    expect(formatObservation(observation("Austrian", 120.5, 0, 125), 0)).toBe(
      "1. Austrian\n   2026-03-02 → 2026-03-06 | Nonstop | 2 hr 5 min | 120.50 EUR"
    )
  })

  test("filters by duration", () => {
    const outcome = new ExtractionSuccess({
      search_id: viennaLondon.id,
      observations: [observation("Lufthansa", 200, 1, 240), observation("Austrian", 120.5, 0, 125), observation("Eurowings", 90, 2)],
      stats
    })

    const shown = presentOutcome(outcome, parseArgs(["--max-duration", "180"]))

    expect(shown._tag === "Success" && shown.observations.map((o) => o.carrier)).toEqual(["Austrian"])
  })

  test("applies filters to successful outcomes only", () => {
    const outcome = new ExtractionSuccess({
      search_id: viennaLondon.id,
      observations: [observation("Lufthansa", 200, 1), observation("Austrian", 120.5, 0), observation("Eurowings", 90, 2)],
      stats
    })
    const args = parseArgs(["--max-stops", "1", "--sort", "price-asc"])

    const shown = presentOutcome(outcome, args)

    expect(shown._tag === "Success" && shown.observations.map((o) => o.carrier)).toEqual(["Austrian", "Lufthansa"])
    expect(presentOutcome(blocked, args)).toBe(blocked)
  })

  test("exits 0 when anything succeeded or nothing ran", () => {
    const ok = new ExtractionSuccess({ search_id: viennaLondon.id, observations: [], stats })
    expect(exitCodeFor([])).toBe(0)
    expect(exitCodeFor([blocked, ok])).toBe(0)
    expect(exitCodeFor([blocked])).toBe(1)
  })
})
