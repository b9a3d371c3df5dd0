/**
 * Shared parsing, sorting, and filtering logic for flight observations.
 * Everything here is pure: the extractor feeds it an HTML snapshot of the page.
 */

import * as cheerio from "cheerio"
import {
  FlightObservation,
  type ObservationFilters,
  type Price,
  type SearchSpec,
  type SortOption
} from "../domain"
import { parseDisplayDate, type DateWindow } from "../utils/dates"
import { readField, selectFirstMatching, type LocatorRegistry } from "./locators"

// ---------------------------------------------------------------------------
// Field parsers
// ---------------------------------------------------------------------------

/** Longest symbols first so "US$" wins over "$" */
const CURRENCY_SYMBOLS: ReadonlyArray<readonly [string, string]> = [
  ["US$", "USD"],
  ["CA$", "CAD"],
  ["A$", "AUD"],
  ["R$", "BRL"],
  ["zł", "PLN"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["¥", "JPY"],
  ["₹", "INR"],
  ["₩", "KRW"],
  ["kr", "SEK"],
  ["$", "USD"]
]

const CURRENCY_CODES = new Set([
  "AED", "AUD", "BGN", "BRL", "CAD", "CHF", "CNY", "CZK", "DKK", "EUR", "GBP", "HKD", "HUF", "ILS",
  "INR", "ISK", "JPY", "KRW", "MXN", "NOK", "NZD", "PLN", "RON", "SEK", "SGD", "THB", "TRY", "USD", "ZAR"
])

const detectCurrency = (text: string): string | undefined => {
  for (const match of text.matchAll(/\b([A-Z]{3})\b/g)) {
    if (CURRENCY_CODES.has(match[1])) return match[1]
  }
  return CURRENCY_SYMBOLS.find(([symbol]) => text.includes(symbol))?.[1]
}

/**
 * Normalizes a localized number ("1.234,56", "1,234.56", "1 234", "120,50").
 * When both separators appear the last one is the decimal mark; a lone
 * separator followed by exactly three digits groups thousands.
 */
export const parseLocalizedNumber = (raw: string): number | undefined => {
  const compact = raw.replace(/[\s']/g, "")
  if (!/^\d[\d.,]*$/.test(compact)) return undefined

  const lastDot = compact.lastIndexOf(".")
  const lastComma = compact.lastIndexOf(",")
  let normalized: string

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? "." : ","
    const grouping = decimal === "." ? "," : "."
    normalized = compact.split(grouping).join("").replace(decimal, ".")
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? "." : ","
    const parts = compact.split(separator)
    const isGrouping = parts.length > 2 || parts[1].length === 3
    normalized = isGrouping ? parts.join("") : parts.join(".")
  } else {
    normalized = compact
  }

  const value = Number(normalized)
  return Number.isFinite(value) ? value : undefined
}

/**
 * Parses price text into amount + currency.
 * Returns undefined for anything that is not a positive amount in a known
 * currency; such entries are skipped rather than stored as zero.
 */
export const parsePrice = (text: string, fallbackCurrency?: string): Price | undefined => {
  const digits = /\d[\d.,\s']*\d|\d/.exec(text)
  if (!digits) return undefined

  const amount = parseLocalizedNumber(digits[0])
  const currency = detectCurrency(text.replace(digits[0], " ")) ?? fallbackCurrency
  if (amount === undefined || amount <= 0 || currency === undefined) return undefined

  return { amount, currency }
}

/**
 * Parses stop text ("Nonstop", "1 stop", "2 Zwischenstopps") to a count
 */
export const parseStops = (text: string): number | undefined => {
  if (/non-?stop|direct|direkt/i.test(text)) return 0
  const match = /(\d+)\s*(?:zwischen)?(?:stop|umstieg)/i.exec(text)
  return match ? parseInt(match[1], 10) : undefined
}

/**
 * Parses duration text ("2 hr 30 min", "14h 5m", "1 Std. 10 Min.") to minutes
 */
export const parseDurationToMinutes = (text: string): number | undefined => {
  const hourMatch = /(\d+)\s*(?:hr|h|std)/i.exec(text)
  const minMatch = /(\d+)\s*(?:min|m\b)/i.exec(text)
  const hours = hourMatch ? parseInt(hourMatch[1], 10) : 0
  const minutes = minMatch ? parseInt(minMatch[1], 10) : 0
  const total = hours * 60 + minutes
  return total > 0 ? total : undefined
}

/**
 * Dedup key for one observation within a batch
 */
export const createFingerprint = (
  carrier: string,
  departureDate: string,
  returnDate: string | undefined,
  price: Price
): string =>
  [
    carrier.trim().toLowerCase(),
    departureDate,
    returnDate ?? "none",
    price.amount.toFixed(2),
    price.currency
  ].join("|")

// ---------------------------------------------------------------------------
// Result list
// ---------------------------------------------------------------------------

export interface ParseOptions {
  readonly observedAt: Date
  readonly locators: LocatorRegistry
  /** Used when the price text carries no currency of its own */
  readonly fallbackCurrency?: string
}

export interface ParsedResultList {
  readonly observations: ReadonlyArray<FlightObservation>
  /** Rendered entries found on the page */
  readonly entries: number
  /** Entries dropped for a missing or unparseable price, departure date or stop count */
  readonly skipped: number
}

const parseDateField = (text: string | undefined, window: DateWindow): string | undefined =>
  text === undefined ? undefined : parseDisplayDate(text, window)

/**
 * Walks the rendered result list of a page snapshot.
 * Entry-level dates win; the page's date inputs fill in when an entry has none.
 */
export const parseResultList = (html: string, spec: SearchSpec, options: ParseOptions): ParsedResultList => {
  const { locators } = options
  const $ = cheerio.load(html)
  const root = $.root()

  const items = selectFirstMatching(root, locators.resultItem)
  if (!items) return { observations: [], entries: 0, skipped: 0 }

  const window: DateWindow = { earliest: spec.earliest_departure, latest: spec.latest_return }
  const pageDeparture = readField(root, locators.pageDepartureDate)
  const pageReturn = readField(root, locators.pageReturnDate)

  const observations: FlightObservation[] = []
  let skipped = 0

  items.each((_, item) => {
    const $item = $(item)

    const price = parsePrice(readField($item, locators.entryPrice) ?? "", options.fallbackCurrency)
    const departure_date =
      parseDateField(readField($item, locators.entryDepartureDate), window) ??
      parseDateField(pageDeparture, window)
    const stops = parseStops(readField($item, locators.entryStops) ?? "")

    if (!price || !departure_date || stops === undefined) {
      skipped++
      return
    }

    const return_date = spec.one_way
      ? undefined
      : parseDateField(readField($item, locators.entryReturnDate), window) ?? parseDateField(pageReturn, window)

    const carrier = readField($item, locators.entryCarrier) ?? "Unknown"
    const duration_minutes = parseDurationToMinutes(readField($item, locators.entryDuration) ?? "")

    observations.push(new FlightObservation({
      search_id: spec.id,
      observed_at: options.observedAt,
      departure_date,
      return_date,
      price,
      carrier,
      stops,
      duration_minutes,
      raw_fingerprint: createFingerprint(carrier, departure_date, return_date, price)
    }))
  })

  return { observations, entries: items.length, skipped }
}

// ---------------------------------------------------------------------------
// Sorting & Filtering (pure functions, used by callers after extraction)
// ---------------------------------------------------------------------------

const compareDurations = (a: FlightObservation, b: FlightObservation, direction: 1 | -1): number => {
  if (a.duration_minutes === undefined) return b.duration_minutes === undefined ? 0 : 1
  if (b.duration_minutes === undefined) return -1
  return (a.duration_minutes - b.duration_minutes) * direction
}

/**
 * Sorts observations based on the specified sort option.
 */
export const sortObservations = (
  observations: ReadonlyArray<FlightObservation>,
  sortOption: SortOption
): FlightObservation[] => {
  if (sortOption === "none") return [...observations]

  return [...observations].sort((a, b) => {
    switch (sortOption) {
      case "price-asc":
        return a.price.amount - b.price.amount
      case "price-desc":
        return b.price.amount - a.price.amount
      case "duration-asc":
        return compareDurations(a, b, 1)
      case "duration-desc":
        return compareDurations(a, b, -1)
      case "departure":
        return a.departure_date.localeCompare(b.departure_date)
      case "carrier":
        return a.carrier.localeCompare(b.carrier)
      default:
        return 0
    }
  })
}

/**
 * Filters observations based on the provided filter criteria.
 */
export const filterObservations = (
  observations: ReadonlyArray<FlightObservation>,
  filters: ObservationFilters
): FlightObservation[] =>
  observations.filter((observation) => {
    // Price filters
    if (filters.maxPrice !== undefined && observation.price.amount > filters.maxPrice) return false
    if (filters.minPrice !== undefined && observation.price.amount < filters.minPrice) return false

    // Carrier filter
    if (filters.carriers && filters.carriers.length > 0) {
      const matchesCarrier = filters.carriers.some((carrier) =>
        observation.carrier.toLowerCase().includes(carrier.toLowerCase())
      )
      if (!matchesCarrier) return false
    }

    // Max stops filter
    if (filters.maxStops !== undefined && observation.stops > filters.maxStops) return false

    // Max duration filter; unknown durations never pass
    if (filters.maxDurationMinutes !== undefined) {
      if (observation.duration_minutes === undefined || observation.duration_minutes > filters.maxDurationMinutes) {
        return false
      }
    }

    return true
  })

/**
 * Applies filter, sort, and limit. Convenience wrapper for callers.
 */
export const applyFiltersAndSort = (
  observations: ReadonlyArray<FlightObservation>,
  filters: ObservationFilters,
  sortOption: SortOption
): FlightObservation[] => {
  const filtered = filterObservations(observations, filters)
  const sorted = sortObservations(filtered, sortOption)
  return filters.limit !== undefined ? sorted.slice(0, filters.limit) : sorted
}
