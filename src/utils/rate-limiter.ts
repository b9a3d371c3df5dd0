/**
 * Paces page loads against the flight-search site
 *
 * Unlike an API quota the browser cannot be told "try later", so a caller that
 * exceeds the budget is delayed until its slot comes up rather than rejected.
 */

import { Clock, Context, Duration, Effect, Layer, Ref } from "effect"

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /** Maximum number of page loads per window */
  readonly maxRequests: number
  /** Time window in milliseconds */
  readonly windowMs: number
  /** Minimum delay between page loads in milliseconds */
  readonly minDelay: number
}

/**
 * Default rate limiter configuration
 * Conservative limits to avoid triggering the site's bot protection
 */
export const defaultRateLimiterConfig: RateLimiterConfig = {
  maxRequests: 10,          // 10 page loads
  windowMs: 60 * 1000,      // per minute
  minDelay: 2000            // 2 seconds between page loads
}

/**
 * Rate limiter service definition using idiomatic Effect v3 class-based Tag.
 */
export class RateLimiterService extends Context.Tag("RateLimiterService")<
  RateLimiterService,
  {
    /** Waits until a page load is allowed and returns the time waited in ms */
    readonly acquire: () => Effect.Effect<number>
  }
>() {}

/**
 * Picks the earliest start time that honours both the minimum spacing and the
 * sliding window, given the slots already handed out (ascending).
 */
export const nextSlot = (slots: ReadonlyArray<number>, now: number, config: RateLimiterConfig): number => {
  let slot = now
  const last = slots[slots.length - 1]
  if (last !== undefined) {
    slot = Math.max(slot, last + config.minDelay)
  }
  if (slots.length >= config.maxRequests) {
    // the slot must fall outside the window opened by the maxRequests-th latest load
    slot = Math.max(slot, slots[slots.length - config.maxRequests] + config.windowMs)
  }
  return slot
}

/**
 * In-memory rate limiter implementation using sliding window
 */
export const RateLimiterLive = (config: RateLimiterConfig = defaultRateLimiterConfig) =>
  Layer.effect(
    RateLimiterService,
    Effect.gen(function* () {
      // Start times handed out so far, ascending; some may lie in the future
      const slotsRef = yield* Ref.make<ReadonlyArray<number>>([])

      return {
        acquire: () =>
          Effect.gen(function* () {
            const now = yield* Clock.currentTimeMillis

            // Reserve the slot atomically so concurrent workers never share one
            const slot = yield* Ref.modify(slotsRef, (slots): readonly [number, ReadonlyArray<number>] => {
              const recent = slots.filter((s) => s > now - config.windowMs)
              const next = nextSlot(recent, now, config)
              return [next, [...recent, next]] as const
            })

            const waitTime = slot - now
            if (waitTime > 0) {
              yield* Effect.logDebug(`Pacing page load for ${waitTime}ms`)
              yield* Effect.sleep(Duration.millis(waitTime))
            }
            return waitTime
          })
      }
    })
  )

/**
 * No-op rate limiter (for disabling rate limiting)
 */
export const RateLimiterDisabled = Layer.succeed(
  RateLimiterService,
  {
    acquire: () => Effect.succeed(0)
  }
)
