/**
 * Tunable settings for extraction runs and the browser
 */

import { Config, Context, Effect, Layer, Option } from "effect"
import { defaultRetryConfig, type RetryConfig } from "../utils/retry"
import { makeLocatorRegistry, type ElementName, type LocatorRegistry, type LocatorRules } from "./locators"

export interface ExtractionSettings {
  /** Flight search page the queries are appended to */
  readonly baseUrl: string
  /** Interface language (hl parameter); locator labels assume it */
  readonly language: string
  /** Display currency (curr parameter); the site picks one when absent */
  readonly currency: string | undefined
  /** Page load timeout */
  readonly navigationTimeoutMs: number
  /** Wait for the result list (or the no-results marker) after a load */
  readonly resultsTimeoutMs: number
  /** How long a consent dialog may take to show up after a load */
  readonly consentGraceMs: number
  /** Wait for a dismissed overlay to go away */
  readonly overlayTimeoutMs: number
  /** Pause after clicks that trigger animations */
  readonly settleMs: number
  /** Upper bound on "more flights" clicks per query */
  readonly maxExpansions: number
  /** Wait for new entries after one "more flights" click */
  readonly expansionTimeoutMs: number
  /** Switch the result list to the "Cheapest" tab before extraction */
  readonly sortByCheapest: boolean
  /** Date pairs loaded per search (1 = the anchor pair only) */
  readonly maxQueriesPerSearch: number
  /** Distance between planned departure dates */
  readonly dateStepDays: number
  /** Searches processed in parallel, each with its own browser context */
  readonly concurrency: number
  readonly retry: RetryConfig
  readonly locators: LocatorRegistry
}

export interface ExtractionOverrides extends Partial<Omit<ExtractionSettings, "retry" | "locators">> {
  readonly retry?: Partial<RetryConfig>
  readonly locators?: Partial<Record<ElementName, LocatorRules>>
}

export const defaultExtractionSettings: ExtractionSettings = {
  baseUrl: "https://www.google.com/travel/flights",
  language: "en",
  currency: undefined,
  navigationTimeoutMs: 60_000,
  resultsTimeoutMs: 15_000,
  consentGraceMs: 2_000,
  overlayTimeoutMs: 5_000,
  settleMs: 1_000,
  maxExpansions: 5,
  expansionTimeoutMs: 5_000,
  sortByCheapest: false,
  maxQueriesPerSearch: 1,
  dateStepDays: 1,
  concurrency: 1,
  retry: defaultRetryConfig,
  locators: makeLocatorRegistry()
}

export const makeExtractionSettings = (overrides: ExtractionOverrides = {}): ExtractionSettings => {
  const { retry, locators, ...rest } = overrides
  return {
    ...defaultExtractionSettings,
    ...rest,
    retry: { ...defaultExtractionSettings.retry, ...retry },
    locators: makeLocatorRegistry(locators)
  }
}

/**
 * Extraction settings as a service, so every component reads the same values.
 */
export class ExtractionConfig extends Context.Tag("ExtractionConfig")<ExtractionConfig, ExtractionSettings>() {
  static readonly layer = (overrides: ExtractionOverrides = {}) =>
    Layer.succeed(ExtractionConfig, makeExtractionSettings(overrides))

  /**
   * Reads EXTRACTION_* environment variables on top of the defaults.
   * Explicit overrides win over the environment.
   */
  static readonly fromEnv = (overrides: ExtractionOverrides = {}) =>
    Layer.effect(
      ExtractionConfig,
      Effect.gen(function* () {
        const base = makeExtractionSettings(overrides)
        const env = yield* Config.all({
          language: Config.string("EXTRACTION_LANGUAGE").pipe(Config.withDefault(base.language)),
          currency: Config.option(Config.string("EXTRACTION_CURRENCY")),
          resultsTimeoutMs: Config.integer("EXTRACTION_RESULTS_TIMEOUT_MS").pipe(Config.withDefault(base.resultsTimeoutMs)),
          overlayTimeoutMs: Config.integer("EXTRACTION_OVERLAY_TIMEOUT_MS").pipe(Config.withDefault(base.overlayTimeoutMs)),
          maxExpansions: Config.integer("EXTRACTION_MAX_EXPANSIONS").pipe(Config.withDefault(base.maxExpansions)),
          sortByCheapest: Config.boolean("EXTRACTION_SORT_BY_CHEAPEST").pipe(Config.withDefault(base.sortByCheapest)),
          maxQueriesPerSearch: Config.integer("EXTRACTION_MAX_QUERIES").pipe(Config.withDefault(base.maxQueriesPerSearch)),
          concurrency: Config.integer("EXTRACTION_CONCURRENCY").pipe(Config.withDefault(base.concurrency)),
          maxRetries: Config.integer("EXTRACTION_MAX_RETRIES").pipe(Config.withDefault(base.retry.maxRetries)),
          retryDelayMs: Config.integer("EXTRACTION_RETRY_DELAY_MS").pipe(Config.withDefault(base.retry.initialDelay))
        })

        const { retry, locators: _locators, ...explicit } = overrides
        const settings: ExtractionSettings = {
          ...base,
          language: env.language,
          currency: Option.getOrElse(env.currency, () => base.currency),
          resultsTimeoutMs: env.resultsTimeoutMs,
          overlayTimeoutMs: env.overlayTimeoutMs,
          maxExpansions: env.maxExpansions,
          sortByCheapest: env.sortByCheapest,
          maxQueriesPerSearch: env.maxQueriesPerSearch,
          concurrency: env.concurrency,
          ...explicit,
          retry: { ...base.retry, maxRetries: env.maxRetries, initialDelay: env.retryDelayMs, ...retry }
        }
        return settings
      })
    )
}

// ---------------------------------------------------------------------------
// Browser
// ---------------------------------------------------------------------------

export interface BrowserConfig {
  /** Chromium binary; supplied by the environment, never downloaded */
  readonly executablePath: string | undefined
  readonly headless: boolean
  readonly userAgent: string
  readonly viewport: { readonly width: number; readonly height: number }
  readonly locale: string
  readonly timezoneId: string
  readonly launchTimeoutMs: number
  readonly extraArgs: ReadonlyArray<string>
}

export const defaultBrowserConfig: BrowserConfig = {
  executablePath: undefined,
  headless: true,
  userAgent: "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  viewport: { width: 1920, height: 1080 },
  locale: "en-US",
  timezoneId: "Europe/Vienna",
  launchTimeoutMs: 30_000,
  extraArgs: []
}

/**
 * Browser settings from BROWSER_* environment variables
 */
export const browserConfigFromEnv = Effect.gen(function* () {
  const env = yield* Config.all({
    executablePath: Config.option(Config.string("BROWSER_EXECUTABLE_PATH")),
    headless: Config.boolean("BROWSER_HEADLESS").pipe(Config.withDefault(defaultBrowserConfig.headless)),
    userAgent: Config.string("BROWSER_USER_AGENT").pipe(Config.withDefault(defaultBrowserConfig.userAgent)),
    locale: Config.string("BROWSER_LOCALE").pipe(Config.withDefault(defaultBrowserConfig.locale)),
    timezoneId: Config.string("BROWSER_TIMEZONE").pipe(Config.withDefault(defaultBrowserConfig.timezoneId))
  })

  const config: BrowserConfig = {
    ...defaultBrowserConfig,
    executablePath: Option.getOrUndefined(env.executablePath),
    headless: env.headless,
    userAgent: env.userAgent,
    locale: env.locale,
    timezoneId: env.timezoneId
  }
  return config
})
