/**
 * BrowserSession backed by a local Chromium driven through playwright-core
 *
 * The browser binary is supplied by the environment (BROWSER_EXECUTABLE_PATH);
 * nothing is downloaded. One browser process is launched lazily and shared by
 * every handle; each handle is its own browser context.
 */

import { Effect, Layer, Option, Ref, SynchronizedRef } from "effect"
import { chromium, errors, type Browser, type BrowserContext, type Page } from "playwright-core"
import { ScraperErrors, type ScraperError } from "../domain"
import { defaultBrowserConfig, type BrowserConfig } from "./config"
import { anyPageSelector, describeRule, toPageSelector } from "./locators"
import { BrowserSession, type SessionHandle } from "./session"

/** Launch flags that hide the most obvious automation markers */
const STEALTH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu"
]

const STEALTH_INIT_SCRIPT = "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })"

const CLEAR_STORAGE_SCRIPT = "(() => { try { localStorage.clear(); sessionStorage.clear(); return true } catch (e) { return false } })()"

interface OpenPage {
  readonly context: BrowserContext
  readonly page: Page
}

const mapDriverError = (operation: string, timeoutMs: number) => (error: unknown): ScraperError =>
  error instanceof errors.TimeoutError
    ? ScraperErrors.navigationTimeout(operation, timeoutMs)
    : ScraperErrors.navigationFailed(operation, String(error))

const makeHandle = (id: number, page: Page): SessionHandle => ({
  id,

  goto: (url, timeoutMs) =>
    Effect.tryPromise({
      try: () => page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs }),
      catch: mapDriverError(`loading ${url}`, timeoutMs)
    }).pipe(Effect.asVoid),

  count: (rule) =>
    Effect.tryPromise({
      try: () => page.locator(toPageSelector(rule)).count(),
      catch: mapDriverError(`counting ${describeRule(rule)}`, 0)
    }),

  waitFor: (rules, state, timeoutMs) => {
    const selector = anyPageSelector(rules)
    if (timeoutMs <= 0) {
      return Effect.tryPromise({
        try: () => page.locator(selector).first().isVisible(),
        catch: mapDriverError(`checking ${selector}`, 0)
      }).pipe(Effect.map((visible) => (state === "present" ? visible : !visible)))
    }
    return Effect.tryPromise({
      try: () =>
        page
          .waitForSelector(selector, { state: state === "present" ? "visible" : "hidden", timeout: timeoutMs })
          .then(
            () => true,
            (error: unknown) => {
              if (error instanceof errors.TimeoutError) return false
              throw error
            }
          ),
      catch: mapDriverError(`waiting for ${selector}`, timeoutMs)
    })
  },

  click: (rule, timeoutMs) =>
    Effect.tryPromise({
      try: () => page.locator(toPageSelector(rule)).first().click({ timeout: timeoutMs }),
      catch: mapDriverError(`clicking ${describeRule(rule)}`, timeoutMs)
    }),

  press: (key) =>
    Effect.tryPromise({
      try: () => page.keyboard.press(key),
      catch: mapDriverError(`pressing ${key}`, 0)
    }),

  content: () =>
    Effect.tryPromise({
      try: () => page.content(),
      catch: mapDriverError("reading page content", 0)
    })
})

/**
 * Live BrowserSession layer. Closing the layer's scope closes the browser.
 */
export const PlaywrightSessionLive = (config: BrowserConfig = defaultBrowserConfig): Layer.Layer<BrowserSession> =>
  Layer.scoped(
    BrowserSession,
    Effect.gen(function* () {
      const browserRef = yield* SynchronizedRef.make(Option.none<Browser>())
      const nextId = yield* Ref.make(1)
      const pages = new Map<number, OpenPage>()

      const launch = Effect.tryPromise({
        try: () =>
          chromium.launch({
            executablePath: config.executablePath,
            headless: config.headless,
            timeout: config.launchTimeoutMs,
            args: [...STEALTH_ARGS, `--window-size=${config.viewport.width},${config.viewport.height}`, ...config.extraArgs]
          }),
        catch: (error) => ScraperErrors.sessionStartFailure(String(error))
      }).pipe(
        Effect.tap(() => Effect.logInfo("Browser launched").pipe(
          Effect.annotateLogs({ executable: config.executablePath ?? "bundled", headless: config.headless })
        ))
      )

      // Launch on first use; relaunch if the previous process went away
      const ensureBrowser = SynchronizedRef.modifyEffect(
        browserRef,
        (current): Effect.Effect<readonly [Browser, Option.Option<Browser>], ScraperError> =>
          Option.match(Option.filter(current, (browser) => browser.isConnected()), {
            onSome: (browser) => Effect.succeed([browser, current] as const),
            onNone: () => launch.pipe(Effect.map((browser) => [browser, Option.some(browser)] as const))
          })
      )

      yield* Effect.addFinalizer(() =>
        SynchronizedRef.get(browserRef).pipe(
          Effect.flatMap(Option.match({
            onNone: () => Effect.void,
            onSome: (browser) =>
              Effect.tryPromise(() => browser.close()).pipe(
                Effect.catchAll((error) => Effect.logWarning(`Browser did not close cleanly: ${String(error)}`))
              )
          }))
        )
      )

      const open = Effect.gen(function* () {
        const browser = yield* ensureBrowser
        const id = yield* Ref.getAndUpdate(nextId, (n) => n + 1)

        const opened = yield* Effect.tryPromise({
          try: async (): Promise<OpenPage> => {
            const context = await browser.newContext({
              userAgent: config.userAgent,
              viewport: { width: config.viewport.width, height: config.viewport.height },
              locale: config.locale,
              timezoneId: config.timezoneId
            })
            await context.addInitScript(STEALTH_INIT_SCRIPT)
            const page = await context.newPage()
            return { context, page }
          },
          catch: (error) => ScraperErrors.sessionStartFailure(`could not open a browser context: ${String(error)}`)
        })

        pages.set(id, opened)
        yield* Effect.logDebug("Session acquired").pipe(Effect.annotateLogs({ session: id }))
        return makeHandle(id, opened.page)
      })

      const release = (handle: SessionHandle) =>
        Effect.gen(function* () {
          const opened = pages.get(handle.id)
          if (!opened) return
          pages.delete(handle.id)
          yield* Effect.tryPromise(() => opened.context.close()).pipe(
            Effect.catchAll((error) => Effect.logWarning(`Browser context did not close cleanly: ${String(error)}`))
          )
          yield* Effect.logDebug("Session released").pipe(Effect.annotateLogs({ session: handle.id }))
        })

      const reset = (handle: SessionHandle) =>
        Effect.gen(function* () {
          const opened = pages.get(handle.id)
          if (!opened) {
            return yield* ScraperErrors.navigationFailed("resetting session", `session ${handle.id} is not open`)
          }
          yield* Effect.tryPromise({
            try: async () => {
              await opened.context.clearCookies()
              await opened.page.evaluate(CLEAR_STORAGE_SCRIPT)
              await opened.page.goto("about:blank")
            },
            catch: (error) => ScraperErrors.navigationFailed("resetting session", String(error))
          })
          yield* Effect.logDebug("Session reset").pipe(Effect.annotateLogs({ session: handle.id }))
        })

      return BrowserSession.of({
        acquire: Effect.acquireRelease(open, release),
        reset,
        release
      })
    })
  )
