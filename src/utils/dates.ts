/**
 * Calendar-date helpers working on YYYY-MM-DD strings (UTC, no time of day)
 */

const DAY_MS = 24 * 60 * 60 * 1000

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december"
]

/** Full month names and their three-letter (or "sept") abbreviations only */
const monthIndexOf = (word: string): number => {
  const lower = word.toLowerCase()
  if (lower === "sept") return 8
  return MONTHS.findIndex((name) => lower === name || lower === name.slice(0, 3))
}

export interface DateWindow {
  readonly earliest: string
  readonly latest: string
}

/**
 * Days since the Unix epoch for an ISO date. NaN for malformed input.
 */
export const toEpochDay = (iso: string): number => {
  const match = ISO_DATE.exec(iso)
  if (!match) return NaN
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) / DAY_MS
}

export const fromEpochDay = (day: number): string =>
  new Date(day * DAY_MS).toISOString().slice(0, 10)

/** True for real calendar dates only (rejects 2026-02-30) */
export const isValidIsoDate = (iso: string): boolean => {
  const day = toEpochDay(iso)
  return Number.isFinite(day) && fromEpochDay(day) === iso
}

export const addDays = (iso: string, days: number): string =>
  fromEpochDay(toEpochDay(iso) + days)

export const daysBetween = (from: string, to: string): number =>
  toEpochDay(to) - toEpochDay(from)

const isoFromParts = (year: number, monthIndex: number, day: number): string | undefined => {
  const iso = `${String(year).padStart(4, "0")}-${String(monthIndex + 1).padStart(2, "0")}-${String(day).padStart(2, "0")}`
  return isValidIsoDate(iso) ? iso : undefined
}

const distanceToWindow = (iso: string, window: DateWindow): number => {
  const day = toEpochDay(iso)
  const start = toEpochDay(window.earliest)
  const end = toEpochDay(window.latest)
  if (day < start) return start - day
  if (day > end) return day - end
  return 0
}

/**
 * Parses a date as the flight UI renders it.
 *
 * Accepts ISO dates anywhere in the text, "Mon, Mar 2", "March 2" and "2 March".
 * Displayed dates carry no year, so the year placing the date closest to the
 * search window wins.
 */
export const parseDisplayDate = (text: string, window: DateWindow): string | undefined => {
  const iso = /(\d{4}-\d{2}-\d{2})/.exec(text)
  if (iso) {
    return isValidIsoDate(iso[1]) ? iso[1] : undefined
  }

  let monthIndex = -1
  let day = NaN

  for (const match of text.matchAll(/\b([A-Za-z]{3,9})\.?\s+(\d{1,2})\b/g)) {
    const index = monthIndexOf(match[1])
    if (index >= 0) {
      monthIndex = index
      day = Number(match[2])
      break
    }
  }

  if (monthIndex < 0) {
    for (const match of text.matchAll(/\b(\d{1,2})\.?\s+([A-Za-z]{3,9})\b/g)) {
      const index = monthIndexOf(match[2])
      if (index >= 0) {
        monthIndex = index
        day = Number(match[1])
        break
      }
    }
  }

  if (monthIndex < 0) return undefined

  const anchorYear = Number(window.earliest.slice(0, 4))
  let best: string | undefined = undefined
  for (const year of [anchorYear - 1, anchorYear, anchorYear + 1]) {
    const candidate = isoFromParts(year, monthIndex, day)
    if (!candidate) continue
    if (best === undefined || distanceToWindow(candidate, window) < distanceToWindow(best, window)) {
      best = candidate
    }
  }
  return best
}
