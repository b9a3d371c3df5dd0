/**
 * Tests for SearchSpec decoding and batch validation.
 */

import { Schema } from "@effect/schema"
import { Either } from "effect"
import { describe, expect, test } from "vitest"
import { FlightObservation, SearchSpec, dedupeByFingerprint, isWithinSearchWindow, validateBatch } from "../src/domain"
import { createFingerprint } from "../src/services/parsing"
import { viennaLondon } from "./support/pages"

const decode = Schema.decodeUnknownEither(SearchSpec)

const observation = (departure: string, returnDate: string | undefined, amount = 100) =>
  new FlightObservation({
    search_id: viennaLondon.id,
    observed_at: new Date("2026-02-01T00:00:00Z"),
    departure_date: departure,
    return_date: returnDate,
    price: { amount, currency: "EUR" },
    carrier: "Austrian",
    stops: 0,
    raw_fingerprint: createFingerprint("Austrian", departure, returnDate, { amount, currency: "EUR" })
  })

describe("SearchSpec", () => {
  const valid = {
    origin: "VIE",
    destination: "LHR",
    earliest_departure: "2026-03-01",
    latest_return: "2026-03-10",
    min_stay_days: 3,
    max_stay_days: 7
  }

  test("decodes a valid search", () => {
    const result = decode(valid)
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.id).toBe("VIE-LHR:2026-03-01..2026-03-10:3-7")
    }
  })

  test("rejects inverted stay bounds", () => {
    expect(Either.isLeft(decode({ ...valid, min_stay_days: 8 }))).toBe(true)
  })

  test("rejects a window that ends before it starts", () => {
    expect(Either.isLeft(decode({ ...valid, latest_return: "2026-02-20" }))).toBe(true)
  })

  test("rejects a window shorter than the minimum stay", () => {
    expect(Either.isLeft(decode({ ...valid, latest_return: "2026-03-03" }))).toBe(true)
  })

  test("one-way searches ignore the minimum stay", () => {
    expect(Either.isRight(decode({ ...valid, latest_return: "2026-03-03", one_way: true }))).toBe(true)
  })

  test("rejects impossible dates and empty places", () => {
    expect(Either.isLeft(decode({ ...valid, earliest_departure: "2026-02-30" }))).toBe(true)
    expect(Either.isLeft(decode({ ...valid, origin: "  " }))).toBe(true)
  })
})

describe("isWithinSearchWindow", () => {
  test("accepts departures and stays inside the bounds", () => {
    expect(isWithinSearchWindow(viennaLondon, observation("2026-03-02", "2026-03-06"))).toBe(true)
    expect(isWithinSearchWindow(viennaLondon, observation("2026-03-01", "2026-03-08"))).toBe(true)
  })

  test("rejects departures outside the window", () => {
    expect(isWithinSearchWindow(viennaLondon, observation("2026-02-28", "2026-03-04"))).toBe(false)
    expect(isWithinSearchWindow(viennaLondon, observation("2026-03-11", undefined))).toBe(false)
  })

  test("rejects stays outside the bounds", () => {
    expect(isWithinSearchWindow(viennaLondon, observation("2026-03-02", "2026-03-04"))).toBe(false)
    expect(isWithinSearchWindow(viennaLondon, observation("2026-03-01", "2026-03-09"))).toBe(false)
  })
})

describe("batch validation", () => {
  test("keeps the first of each fingerprint", () => {
    const first = observation("2026-03-02", "2026-03-06")
    const { unique, duplicates } = dedupeByFingerprint([first, observation("2026-03-02", "2026-03-06"), observation("2026-03-03", "2026-03-07")])
    expect(unique).toHaveLength(2)
    expect(unique[0]).toBe(first)
    expect(duplicates).toBe(1)
  })

  test("counts what it drops", () => {
    const result = validateBatch(viennaLondon, [
      observation("2026-03-02", "2026-03-06"),
      observation("2026-03-02", "2026-03-06"),
      observation("2026-02-27", "2026-03-02")
    ])
    expect(result.observations).toHaveLength(1)
    expect(result.outOfWindow).toBe(1)
    expect(result.duplicates).toBe(1)
  })
})
