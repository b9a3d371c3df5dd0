/**
 * Domain types and schemas for the flight price tracker
 */

import { Schema } from "@effect/schema"
import { FailureKindSchema } from "./errors"
import { addDays, isValidIsoDate, toEpochDay } from "../utils/dates"

/** Date schema (YYYY-MM-DD format, real calendar dates only) */
export const DateStringSchema = Schema.String.pipe(
  Schema.pattern(/^\d{4}-\d{2}-\d{2}$/),
  Schema.filter((value) => isValidIsoDate(value) || `${value} is not a calendar date`)
)

/** Airport code (e.g. VIE) or city name (e.g. Vienna) */
export const PlaceSchema = Schema.String.pipe(
  Schema.filter((value) => value.trim().length > 0 || "place must not be empty")
)

const StayDaysSchema = Schema.Number.pipe(Schema.int(), Schema.nonNegative())

/** One configured route and date window to track */
export class SearchSpec extends Schema.Class<SearchSpec>("SearchSpec")(
  Schema.Struct({
    origin: PlaceSchema,
    destination: PlaceSchema,
    earliest_departure: DateStringSchema,
    latest_return: DateStringSchema,
    min_stay_days: StayDaysSchema,
    max_stay_days: StayDaysSchema,
    one_way: Schema.optional(Schema.Boolean)
  }).pipe(
    Schema.filter((spec) => {
      if (spec.max_stay_days < spec.min_stay_days) {
        return "max_stay_days must be >= min_stay_days"
      }
      if (toEpochDay(spec.latest_return) < toEpochDay(spec.earliest_departure)) {
        return "latest_return must not be before earliest_departure"
      }
      if (!spec.one_way && toEpochDay(addDays(spec.earliest_departure, spec.min_stay_days)) > toEpochDay(spec.latest_return)) {
        return "the window is shorter than min_stay_days"
      }
      return true
    })
  )
) {
  /** Stable identifier used to tie observations back to this search */
  get id(): string {
    const base = `${this.origin}-${this.destination}:${this.earliest_departure}..${this.latest_return}:${this.min_stay_days}-${this.max_stay_days}`
    return this.one_way ? `${base}:oneway` : base
  }
}

export const PriceSchema = Schema.Struct({
  amount: Schema.Number.pipe(Schema.positive()),
  currency: Schema.String.pipe(Schema.pattern(/^[A-Z]{3}$/))
})
export type Price = Schema.Schema.Type<typeof PriceSchema>

/** One parsed price data point for a route on a given date pair */
export class FlightObservation extends Schema.Class<FlightObservation>("FlightObservation")({
  search_id: Schema.String,
  observed_at: Schema.Date,
  departure_date: DateStringSchema,
  return_date: Schema.optional(DateStringSchema),
  price: PriceSchema,
  carrier: Schema.String,            // Airline name(s)
  stops: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  duration_minutes: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive())),  // Absent when unreadable
  raw_fingerprint: Schema.String     // Dedup key within one batch
}) {}

/** Counters describing what happened to the rendered entries of one search */
export const ExtractionStatsSchema = Schema.Struct({
  queries: Schema.Number,
  entries: Schema.Number,
  skipped: Schema.Number,
  out_of_window: Schema.Number,
  duplicates: Schema.Number
})
export type ExtractionStats = Schema.Schema.Type<typeof ExtractionStatsSchema>

/** Orchestrator phases, in the order a successful search walks through them */
export const ExtractionPhaseSchema = Schema.Literal(
  "Idle",
  "SessionAcquired",
  "Navigated",
  "UIResolved",
  "ResultsReady",
  "Extracted",
  "Succeeded",
  "Failed"
)
export type ExtractionPhase = Schema.Schema.Type<typeof ExtractionPhaseSchema>

export class ExtractionSuccess extends Schema.TaggedClass<ExtractionSuccess>()("Success", {
  search_id: Schema.String,
  observations: Schema.Array(FlightObservation),
  stats: ExtractionStatsSchema
}) {}

export class ExtractionFailure extends Schema.TaggedClass<ExtractionFailure>()("Failure", {
  search_id: Schema.String,
  kind: FailureKindSchema,
  message: Schema.String,
  attempts: Schema.Number,
  phase: ExtractionPhaseSchema
}) {}

/** Result of one orchestrated search run, returned to the caller */
export const ExtractionOutcomeSchema = Schema.Union(ExtractionSuccess, ExtractionFailure)
export type ExtractionOutcome = Schema.Schema.Type<typeof ExtractionOutcomeSchema>

/** One date pair to load for a search */
export interface SearchQuery {
  readonly departure_date: string
  readonly return_date: string | undefined
}

/** Sorting options for observation lists */
export const SortOptionSchema = Schema.Literal(
  "price-asc",      // Price: low to high
  "price-desc",     // Price: high to low
  "duration-asc",   // Duration: shortest first, unknown last
  "duration-desc",  // Duration: longest first, unknown last
  "departure",      // Departure date: earliest first
  "carrier",        // Carrier: alphabetical
  "none"            // No sorting (extraction order)
)
export type SortOption = Schema.Schema.Type<typeof SortOptionSchema>

/** Filtering options applied by callers after extraction */
export const ObservationFiltersSchema = Schema.Struct({
  /** Maximum price (inclusive). */
  maxPrice: Schema.optional(Schema.Number.pipe(Schema.positive())),

  /** Minimum price (inclusive). */
  minPrice: Schema.optional(Schema.Number.pipe(Schema.positive())),

  /** Only observations from these carriers (case-insensitive substring match). */
  carriers: Schema.optional(Schema.Array(Schema.String)),

  /** Maximum number of stops (0 = nonstop). */
  maxStops: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.nonNegative())),

  /** Maximum duration in minutes. Observations of unknown duration are excluded. */
  maxDurationMinutes: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive())),

  /** Maximum number of results to return. Applied after filtering and sorting. */
  limit: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive()))
})
export type ObservationFilters = Schema.Schema.Type<typeof ObservationFiltersSchema>
