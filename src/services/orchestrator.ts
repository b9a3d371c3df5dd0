/**
 * Extraction orchestrator: turns search specs into outcomes
 *
 * Each search walks Idle → SessionAcquired → Navigated → UIResolved →
 * ResultsReady → Extracted → Succeeded | Failed on its own session handle.
 * Transient failures are retried on the same handle after a reset; every
 * failure ends up as a Failure outcome, never as an error.
 */

import { Context, Effect, Layer, Option, Ref } from "effect"
import {
  ExtractionFailure,
  ExtractionSuccess,
  ScraperErrors,
  validateBatch,
  type ExtractionOutcome,
  type ExtractionPhase,
  type ExtractionStats,
  type SearchSpec
} from "../domain"
import { abortReason, cancellable } from "../utils/cancellation"
import { RateLimiterService } from "../utils/rate-limiter"
import { withRetryAndLog } from "../utils/retry"
import { ExtractionConfig } from "./config"
import { extractObservations, type ExtractedBatch } from "./extractor"
import { navigate, planQueries } from "./navigator"
import { BrowserSession } from "./session"

export interface RunOptions {
  /** Aborting cancels the in-flight searches and skips the rest */
  readonly signal?: AbortSignal
}

/**
 * Service Definition for running searches
 */
export class ExtractionService extends Context.Tag("ExtractionService")<
  ExtractionService,
  {
    readonly run: (spec: SearchSpec, options?: RunOptions) => Effect.Effect<ExtractionOutcome>
    /** Outcomes come back in the order of `specs` */
    readonly runAll: (
      specs: ReadonlyArray<SearchSpec>,
      options?: RunOptions
    ) => Effect.Effect<ReadonlyArray<ExtractionOutcome>>
  }
>() {}

const emptyBatch: ExtractedBatch = { observations: [], entries: 0, skipped: 0, duplicates: 0 }

/** Outcome for a search that was never started */
const notStarted = (spec: SearchSpec, cause: Pick<ExtractionFailure, "kind" | "message">) =>
  new ExtractionFailure({
    search_id: spec.id,
    kind: cause.kind,
    message: cause.message,
    attempts: 0,
    phase: "Idle"
  })

export const ExtractionServiceLive = Layer.effect(
  ExtractionService,
  Effect.gen(function* () {
    const session = yield* BrowserSession
    const settings = yield* ExtractionConfig
    const rateLimiter = yield* RateLimiterService

    const runSearch = (spec: SearchSpec, signal: AbortSignal | undefined) =>
      Effect.gen(function* () {
        const phase = yield* Ref.make<ExtractionPhase>("Idle")
        const attempts = yield* Ref.make(0)

        const enter = (next: ExtractionPhase) =>
          Ref.set(phase, next).pipe(
            Effect.zipRight(Effect.logDebug(`Entered ${next}`)),
            Effect.annotateLogs({ phase: next })
          )

        const queries = planQueries(spec, settings)

        const pipeline = Effect.scoped(
          Effect.gen(function* () {
            const handle = yield* session.acquire
            yield* enter("SessionAcquired")

            const attempt = Effect.gen(function* () {
              const made = yield* Ref.updateAndGet(attempts, (n) => n + 1)
              if (made > 1) {
                // drop cookies, overlays and half-expanded lists left by the failed attempt
                yield* session.reset(handle)
                yield* enter("SessionAcquired")
              }

              const batches: ExtractedBatch[] = []
              for (const query of queries) {
                const hasResults = yield* navigate(handle, spec, query, enter)
                batches.push(hasResults ? yield* extractObservations(handle, spec) : emptyBatch)
                yield* enter("Extracted")
              }
              return batches
            })

            return yield* withRetryAndLog(attempt, `search ${spec.id}`, settings.retry)
          })
        )

        const outcome = cancellable(pipeline, signal).pipe(
          Effect.map((batches): ExtractionOutcome => {
            const merged = batches.flatMap((batch) => batch.observations)
            const { observations, outOfWindow, duplicates } = validateBatch(spec, merged)
            const stats: ExtractionStats = {
              queries: batches.length,
              entries: batches.reduce((sum, batch) => sum + batch.entries, 0),
              skipped: batches.reduce((sum, batch) => sum + batch.skipped, 0),
              out_of_window: outOfWindow,
              duplicates: duplicates + batches.reduce((sum, batch) => sum + batch.duplicates, 0)
            }
            return new ExtractionSuccess({ search_id: spec.id, observations, stats })
          }),
          Effect.tap(() => enter("Succeeded")),
          Effect.catchAll((error) =>
            Effect.gen(function* () {
              const reached = yield* Ref.get(phase)
              // a failed launch still counts as the first attempt
              const made = Math.max(1, yield* Ref.get(attempts))
              yield* enter("Failed")
              yield* Effect.logWarning(`Search failed: ${error.reason}`)
              const failure: ExtractionOutcome = new ExtractionFailure({
                search_id: spec.id,
                kind: error.reason,
                message: error.message,
                attempts: made,
                phase: reached
              })
              return failure
            })
          )
        )

        return yield* outcome
      }).pipe(
        Effect.provideService(ExtractionConfig, settings),
        Effect.provideService(RateLimiterService, rateLimiter),
        Effect.annotateLogs({ search: spec.id }),
        Effect.withLogSpan("search")
      )

    const run = (spec: SearchSpec, { signal }: RunOptions = {}): Effect.Effect<ExtractionOutcome> => {
      if (signal?.aborted) {
        const { reason, message } = ScraperErrors.cancelled(abortReason(signal))
        return Effect.succeed(notStarted(spec, { kind: reason, message }))
      }
      return runSearch(spec, signal)
    }

    const runAll = (specs: ReadonlyArray<SearchSpec>, options: RunOptions = {}) =>
      Effect.gen(function* () {
        // Set by the first search whose browser would not start
        const halted = yield* Ref.make(Option.none<ExtractionFailure>())

        return yield* Effect.forEach(
          specs,
          (spec) =>
            Effect.gen(function* () {
              const blocker = yield* Ref.get(halted)
              if (Option.isSome(blocker)) {
                return notStarted(spec, blocker.value)
              }
              const outcome = yield* run(spec, options)
              if (outcome._tag === "Failure" && outcome.kind === "SessionStartFailure") {
                yield* Ref.update(halted, Option.orElse(() => Option.some(outcome)))
              }
              return outcome
            }),
          { concurrency: Math.max(1, settings.concurrency) }
        )
      }).pipe(Effect.withLogSpan("runAll"))

    return ExtractionService.of({ run, runAll })
  })
)
