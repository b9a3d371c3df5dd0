/**
 * BrowserSession interface definition
 * This is the contract that the live browser and the test fakes both follow
 */

import { Context, Effect, Scope } from "effect"
import type { ScraperError } from "../domain"
import type { LocatorRule } from "./locators"

export type ElementState = "present" | "absent"

/**
 * A ready page context. Every interaction is expressed through locator rules
 * so the same calls can be answered by a real page or an in-memory document.
 */
export interface SessionHandle {
  readonly id: number
  readonly goto: (url: string, timeoutMs: number) => Effect.Effect<void, ScraperError>
  /** Number of attached elements matching the rule */
  readonly count: (rule: LocatorRule) => Effect.Effect<number, ScraperError>
  /**
   * Waits until any rule matches a visible element ("present") or none does
   * ("absent"). Resolves to false when the wait runs out; a zero timeout
   * checks once.
   */
  readonly waitFor: (
    rules: ReadonlyArray<LocatorRule>,
    state: ElementState,
    timeoutMs: number
  ) => Effect.Effect<boolean, ScraperError>
  /** Clicks the first element matching the rule */
  readonly click: (rule: LocatorRule, timeoutMs: number) => Effect.Effect<void, ScraperError>
  readonly press: (key: string) => Effect.Effect<void, ScraperError>
  /** Serialized DOM of the current page */
  readonly content: () => Effect.Effect<string, ScraperError>
}

/**
 * Service Definition for browser session management.
 * `acquire` registers `release` on the surrounding scope, so a handle is
 * released on success, failure and interruption alike.
 */
export class BrowserSession extends Context.Tag("BrowserSession")<
  BrowserSession,
  {
    readonly acquire: Effect.Effect<SessionHandle, ScraperError, Scope.Scope>
    /** Clears cookies and storage, keeping the browser process alive */
    readonly reset: (handle: SessionHandle) => Effect.Effect<void, ScraperError>
    readonly release: (handle: SessionHandle) => Effect.Effect<void>
  }
>() {}

/**
 * Checks whether any of the rules is visible right now
 */
export const isPresent = (handle: SessionHandle, rules: ReadonlyArray<LocatorRule>) =>
  handle.waitFor(rules, "present", 0)

/**
 * First rule in the list that currently matches something
 */
export const firstMatching = (handle: SessionHandle, rules: ReadonlyArray<LocatorRule>) =>
  Effect.findFirst(rules, (rule) => handle.waitFor([rule], "present", 0))
