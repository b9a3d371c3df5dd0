/**
 * Detects and dismisses overlays that block the result page
 *
 * Each known overlay is a tagged variant carrying its own protocol data; one
 * routine runs every variant through detect → dismiss → bounded wait, in the
 * order of `knownOverlays`.
 */

import { Data, Effect, Option } from "effect"
import { ScraperErrors, type ScraperError } from "../domain"
import { ExtractionConfig } from "./config"
import type { ElementName } from "./locators"
import { firstMatching, type SessionHandle } from "./session"

export type DismissStep = Data.TaggedEnum<{
  Click: { readonly target: ElementName }
  Press: { readonly key: string }
}>
export const DismissStep = Data.taggedEnum<DismissStep>()

type OverlayProtocol = {
  /** Element whose visibility means the overlay is up */
  readonly detect: ElementName
  readonly dismiss: ReadonlyArray<DismissStep>
  /** A critical overlay that stays up fails the attempt */
  readonly critical: boolean
  /** Pops up some time after the page loads, so detection waits for it */
  readonly appearsLate: boolean
}

export type Overlay = Data.TaggedEnum<{
  ConsentDialog: OverlayProtocol
  PromoInterstitial: OverlayProtocol
  SignInNudge: OverlayProtocol
}>
export const Overlay = Data.taggedEnum<Overlay>()

export type OverlayKind = Overlay["_tag"]

/** Priority order: consent blocks everything else, so it goes first */
export const knownOverlays: ReadonlyArray<Overlay> = [
  Overlay.ConsentDialog({
    detect: "consentDialog",
    dismiss: [DismissStep.Click({ target: "consentDismiss" })],
    critical: true,
    appearsLate: true
  }),
  Overlay.PromoInterstitial({
    detect: "promoDialog",
    dismiss: [DismissStep.Press({ key: "Escape" }), DismissStep.Click({ target: "promoDismiss" })],
    critical: false,
    appearsLate: false
  }),
  Overlay.SignInNudge({
    detect: "signInNudge",
    dismiss: [DismissStep.Click({ target: "signInDismiss" })],
    critical: false,
    appearsLate: false
  })
]

export type OverlayStatus = "absent" | "dismissed" | "stuck"

export interface OverlayReport {
  readonly kind: OverlayKind
  readonly status: OverlayStatus
}

export interface ResolveOptions {
  /** First resolution after a page load: late overlays get their grace period */
  readonly afterLoad?: boolean
}

const runStep = (handle: SessionHandle, step: DismissStep) =>
  Effect.gen(function* () {
    const { locators, overlayTimeoutMs } = yield* ExtractionConfig
    switch (step._tag) {
      case "Press":
        return yield* handle.press(step.key)
      case "Click": {
        const rule = yield* firstMatching(handle, locators[step.target])
        if (Option.isNone(rule)) return
        return yield* handle.click(rule.value, overlayTimeoutMs)
      }
    }
  }).pipe(
    // A step that misses (element already gone, click intercepted) is judged by the wait that follows
    Effect.catchIf(
      (error: ScraperError) => error.reason === "NavigationFailed" || error.reason === "NavigationTimeout",
      (error) => Effect.logDebug(`Dismiss step ${step._tag} missed: ${error.message}`)
    )
  )

/**
 * Runs one overlay through the detect → dismiss → bounded wait protocol
 */
export const clearOverlay = (handle: SessionHandle, overlay: Overlay, options: ResolveOptions = {}) =>
  Effect.gen(function* () {
    const { locators, consentGraceMs, overlayTimeoutMs } = yield* ExtractionConfig
    const rules = locators[overlay.detect]

    const graceMs = overlay.appearsLate && options.afterLoad ? consentGraceMs : 0
    const present = yield* handle.waitFor(rules, "present", graceMs)
    if (!present) {
      return { kind: overlay._tag, status: "absent" } satisfies OverlayReport
    }

    yield* Effect.logDebug(`Overlay detected: ${overlay._tag}`)
    for (const step of overlay.dismiss) {
      yield* runStep(handle, step)
      const gone = yield* handle.waitFor(rules, "absent", 0)
      if (gone) break
    }

    const gone = yield* handle.waitFor(rules, "absent", overlayTimeoutMs)
    if (gone) {
      yield* Effect.logDebug(`Overlay dismissed: ${overlay._tag}`)
      return { kind: overlay._tag, status: "dismissed" } satisfies OverlayReport
    }
    if (overlay.critical) {
      return yield* ScraperErrors.blockingUi(overlay._tag, overlayTimeoutMs)
    }
    yield* Effect.logWarning(`Overlay ${overlay._tag} could not be dismissed, continuing`)
    return { kind: overlay._tag, status: "stuck" } satisfies OverlayReport
  }).pipe(Effect.annotateLogs({ overlay: overlay._tag }))

/**
 * Clears every known overlay currently on the page. Safe to call repeatedly:
 * with nothing showing it only looks.
 */
export const resolveUiState = (
  handle: SessionHandle,
  options: ResolveOptions = {},
  overlays: ReadonlyArray<Overlay> = knownOverlays
): Effect.Effect<ReadonlyArray<OverlayReport>, ScraperError, ExtractionConfig> =>
  Effect.forEach(overlays, (overlay) => clearOverlay(handle, overlay, options))
