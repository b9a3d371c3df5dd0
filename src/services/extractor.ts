/**
 * Reads the prepared result list into flight observations
 */

import { Clock, Effect } from "effect"
import { ScraperErrors, dedupeByFingerprint, type FlightObservation, type SearchSpec } from "../domain"
import { ExtractionConfig } from "./config"
import { parseResultList } from "./parsing"
import type { SessionHandle } from "./session"

export interface ExtractedBatch {
  readonly observations: ReadonlyArray<FlightObservation>
  readonly entries: number
  readonly skipped: number
  readonly duplicates: number
}

/**
 * Snapshots the page and parses every rendered entry.
 *
 * An empty list is a valid result. A list whose entries all fail to parse is
 * not: that means the markup moved away from the locator rules.
 */
export const extractObservations = (handle: SessionHandle, spec: SearchSpec) =>
  Effect.gen(function* () {
    const { locators, currency } = yield* ExtractionConfig
    const html = yield* handle.content()
    const now = yield* Clock.currentTimeMillis

    const parsed = yield* Effect.try({
      try: () => parseResultList(html, spec, { observedAt: new Date(now), locators, fallbackCurrency: currency }),
      catch: (error) => ScraperErrors.navigationFailed("parsing the result list", String(error))
    })

    if (parsed.entries > 0 && parsed.observations.length === 0) {
      return yield* ScraperErrors.integrity(parsed.entries, parsed.skipped)
    }
    if (parsed.skipped > 0) {
      yield* Effect.logDebug(`Skipped ${parsed.skipped} of ${parsed.entries} entries`)
    }

    const { unique, duplicates } = dedupeByFingerprint(parsed.observations)
    const batch: ExtractedBatch = {
      observations: unique,
      entries: parsed.entries,
      skipped: parsed.skipped,
      duplicates
    }
    return batch
  })
