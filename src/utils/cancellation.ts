/**
 * Bridges AbortSignal-based cancellation into Effect interruption
 */

import { Effect } from "effect"
import { ScraperErrors, type ScraperError } from "../domain/errors"

export const abortReason = (signal: AbortSignal): string =>
  signal.reason instanceof Error ? signal.reason.message : String(signal.reason ?? "run aborted")

/**
 * Fails with a Cancelled error once the signal aborts; never succeeds.
 */
export const whenAborted = (signal: AbortSignal): Effect.Effect<never, ScraperError> =>
  Effect.async<never, ScraperError>((resume) => {
    const onAbort = () => resume(Effect.fail(ScraperErrors.cancelled(abortReason(signal))))
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener("abort", onAbort, { once: true })
    return Effect.sync(() => signal.removeEventListener("abort", onAbort))
  })

/**
 * Runs the effect until it completes or the signal aborts, whichever comes
 * first. On abort the effect is interrupted, so its finalizers run.
 */
export const cancellable = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  signal: AbortSignal | undefined
): Effect.Effect<A, E | ScraperError, R> =>
  signal === undefined ? effect : Effect.raceFirst(effect, whenAborted(signal))
