/**
 * Error taxonomy for extraction runs
 */

import { Schema } from "@effect/schema"

export const FailureKindSchema = Schema.Literal(
  "SessionStartFailure",
  "NavigationTimeout",
  "NavigationFailed",
  "BlockingUIFailure",
  "ExtractionIntegrityFailure",
  "Cancelled",
  "InvalidInput"
)
export type FailureKind = Schema.Schema.Type<typeof FailureKindSchema>

/** Custom Error Type for extraction operations */
export class ScraperError extends Schema.TaggedError<ScraperError>()("ScraperError", {
  reason: FailureKindSchema,
  message: Schema.String
}) {}

/**
 * Helper functions for creating well-formatted error messages
 */
export const ScraperErrors = {
  sessionStartFailure: (details: string) =>
    new ScraperError({
      reason: "SessionStartFailure",
      message: `Could not launch the browser.\nDetails: ${details}\n\nCheck that BROWSER_EXECUTABLE_PATH points at a Chromium build.`
    }),

  navigationTimeout: (operation: string, timeoutMs: number) =>
    new ScraperError({
      reason: "NavigationTimeout",
      message: `Timed out after ${timeoutMs}ms: ${operation}`
    }),

  navigationFailed: (operation: string, details: string) =>
    new ScraperError({
      reason: "NavigationFailed",
      message: `Browser operation failed: ${operation}\nDetails: ${details}`
    }),

  blockingUi: (overlay: string, timeoutMs: number) =>
    new ScraperError({
      reason: "BlockingUIFailure",
      message: `Overlay "${overlay}" was still blocking the page ${timeoutMs}ms after dismissal`
    }),

  integrity: (entries: number, skipped: number) =>
    new ScraperError({
      reason: "ExtractionIntegrityFailure",
      message: `Parsed 0 of ${entries} result entries (${skipped} skipped).\n\nThe page structure has probably changed; review the locator rules.`
    }),

  cancelled: (details: string) =>
    new ScraperError({
      reason: "Cancelled",
      message: `Extraction cancelled: ${details}`
    }),

  invalidInput: (field: string, reason: string) =>
    new ScraperError({
      reason: "InvalidInput",
      message: `Invalid input for ${field}: ${reason}`
    })
}
