/**
 * Retry logic with exponential backoff for Effect operations
 */

import { Effect, Schedule, Duration } from "effect"
import { ScraperError } from "../domain/errors"

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Retries after the first attempt (2 means at most 3 attempts) */
  readonly maxRetries: number
  /** Initial delay in milliseconds */
  readonly initialDelay: number
  /** Maximum delay in milliseconds (caps individual delays) */
  readonly maxDelay: number
  /** Backoff factor (multiplier for each retry) */
  readonly backoffFactor: number
}

/**
 * Default retry configuration
 */
export const defaultRetryConfig: RetryConfig = {
  maxRetries: 2,
  initialDelay: 1000,    // 1 second
  maxDelay: 30000,       // 30 seconds
  backoffFactor: 2
}

/**
 * Creates a retry schedule with exponential backoff, jitter, and a cap.
 *
 * - Exponential delays: initialDelay, initialDelay * factor, initialDelay * factor^2, ...
 * - Individual delays capped at maxDelay via union (takes the minimum of the two schedules)
 * - Jitter applied so parallel workers do not hit the site in lockstep
 * - Total retries capped at maxRetries (intersect with recurs)
 */
export const createRetrySchedule = (config: RetryConfig = defaultRetryConfig) =>
  Schedule.exponential(Duration.millis(config.initialDelay), config.backoffFactor).pipe(
    Schedule.union(Schedule.spaced(Duration.millis(config.maxDelay))),
    Schedule.jittered,
    Schedule.intersect(Schedule.recurs(config.maxRetries))
  )

/**
 * Transient browser and UI states are retried; a broken page structure, a
 * missing browser or a cancelled run are not.
 */
export const isRetryableError = (error: ScraperError): boolean =>
  error.reason === "NavigationTimeout" ||
  error.reason === "NavigationFailed" ||
  error.reason === "BlockingUIFailure"

/**
 * Wraps an Effect with retry logic and structured logging.
 */
export const withRetryAndLog = <A, R>(
  effect: Effect.Effect<A, ScraperError, R>,
  operationName: string,
  config: RetryConfig = defaultRetryConfig
): Effect.Effect<A, ScraperError, R> =>
  effect.pipe(
    Effect.tapError((error) =>
      isRetryableError(error)
        ? Effect.logWarning(`${operationName} failed, will retry if attempts remain`).pipe(
            Effect.annotateLogs({ operation: operationName, reason: error.reason })
          )
        : Effect.void
    ),
    Effect.retry({
      schedule: createRetrySchedule(config),
      while: isRetryableError
    }),
    Effect.tapError((error) =>
      Effect.logWarning(`${operationName} gave up`).pipe(
        Effect.annotateLogs({ operation: operationName, reason: error.reason })
      )
    )
  )
