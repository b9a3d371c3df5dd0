/**
 * Emission-time checks for observation batches
 *
 * Everything the extractor returns passes through here before it reaches the
 * caller: observations outside the search window are dropped and repeated
 * fingerprints collapse to their first occurrence.
 */

import { daysBetween, toEpochDay } from "../utils/dates"
import type { FlightObservation, SearchSpec } from "./types"

/**
 * True when the departure lies inside the window and, for a return flight,
 * the stay length respects the configured bounds.
 */
export const isWithinSearchWindow = (spec: SearchSpec, observation: FlightObservation): boolean => {
  const departure = toEpochDay(observation.departure_date)
  if (departure < toEpochDay(spec.earliest_departure) || departure > toEpochDay(spec.latest_return)) {
    return false
  }
  if (observation.return_date === undefined) return true

  const stay = daysBetween(observation.departure_date, observation.return_date)
  return stay >= spec.min_stay_days && stay <= spec.max_stay_days
}

/**
 * Keeps the first observation for each raw fingerprint
 */
export const dedupeByFingerprint = (
  observations: ReadonlyArray<FlightObservation>
): { readonly unique: Array<FlightObservation>; readonly duplicates: number } => {
  const seen = new Set<string>()
  const unique: Array<FlightObservation> = []
  for (const observation of observations) {
    if (seen.has(observation.raw_fingerprint)) continue
    seen.add(observation.raw_fingerprint)
    unique.push(observation)
  }
  return { unique, duplicates: observations.length - unique.length }
}

/**
 * Applies both invariants to a batch
 */
export const validateBatch = (
  spec: SearchSpec,
  observations: ReadonlyArray<FlightObservation>
): { readonly observations: Array<FlightObservation>; readonly outOfWindow: number; readonly duplicates: number } => {
  const inWindow = observations.filter((observation) => isWithinSearchWindow(spec, observation))
  const { unique, duplicates } = dedupeByFingerprint(inWindow)
  return {
    observations: unique,
    outOfWindow: observations.length - inWindow.length,
    duplicates
  }
}
