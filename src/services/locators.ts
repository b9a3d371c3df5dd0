/**
 * Locator strategies for the flight-search UI
 *
 * The page markup is not ours and changes without notice, so every logical
 * element is described by an ordered list of fallback rules. Each rule can be
 * rendered for the live page (Playwright selector syntax) and for a static
 * HTML snapshot (cheerio selector syntax); the first rule that matches wins.
 */

import { Data } from "effect"
import type * as cheerio from "cheerio"

export type LocatorRule = Data.TaggedEnum<{
  /** Plain CSS selector; reads the element's text */
  Css: { readonly selector: string }
  /** Element of the given tag whose text contains any of the labels */
  Text: { readonly tag: string; readonly labels: ReadonlyArray<string> }
  /** CSS selector; reads the named attribute instead of the text */
  Attribute: { readonly selector: string; readonly name: string }
}>
export const LocatorRule = Data.taggedEnum<LocatorRule>()

/** Ordered fallbacks, never empty */
export type LocatorRules = readonly [LocatorRule, ...Array<LocatorRule>]

export type ElementName =
  | "consentDialog"
  | "consentDismiss"
  | "promoDialog"
  | "promoDismiss"
  | "signInNudge"
  | "signInDismiss"
  | "resultsContainer"
  | "resultItem"
  | "noResults"
  | "showMore"
  | "cheapestTab"
  | "entryPrice"
  | "entryCarrier"
  | "entryStops"
  | "entryDuration"
  | "entryDepartureDate"
  | "entryReturnDate"
  | "pageDepartureDate"
  | "pageReturnDate"

export type LocatorRegistry = Readonly<Record<ElementName, LocatorRules>>

const { Css, Text, Attribute } = LocatorRule

const CONSENT_REJECT = ["Reject all", "Alle ablehnen"]
const CONSENT_ACCEPT = ["Accept all", "Alle akzeptieren"]
const PROMO_BUTTONS = ["Got it", "Verstanden", "Done"]

export const defaultLocators: LocatorRegistry = {
  consentDialog: [
    Css({ selector: "form[action*=\"consent.google\"]" }),
    Text({ tag: "button", labels: [...CONSENT_REJECT, ...CONSENT_ACCEPT] })
  ],
  consentDismiss: [
    Text({ tag: "button", labels: CONSENT_REJECT }),
    Text({ tag: "button", labels: CONSENT_ACCEPT })
  ],
  promoDialog: [Text({ tag: "button", labels: PROMO_BUTTONS })],
  promoDismiss: [Text({ tag: "button", labels: PROMO_BUTTONS })],
  signInNudge: [Text({ tag: "button", labels: ["Stay signed out", "Abgemeldet bleiben"] })],
  signInDismiss: [
    Text({ tag: "button", labels: ["Stay signed out", "Abgemeldet bleiben"] }),
    Text({ tag: "button", labels: ["No thanks", "Nein danke"] })
  ],

  resultsContainer: [
    Css({ selector: "div[jsname=\"IWWDBc\"]" }),
    Css({ selector: "div[jsname=\"YdtKid\"]" }),
    Css({ selector: "ul.Rk10dc" })
  ],
  resultItem: [
    Css({ selector: "li.pIav2d" }),
    Css({ selector: "ul.Rk10dc > li" })
  ],
  noResults: [Text({ tag: "div", labels: ["No results returned", "Keine Ergebnisse"] })],
  showMore: [
    Css({ selector: "li.ZVk93d" }),
    Text({ tag: "button", labels: ["more flights", "weitere Flüge"] })
  ],
  cheapestTab: [
    Css({ selector: "#M7sBEb" }),
    Text({ tag: "button", labels: ["Cheapest", "Günstigste"] })
  ],

  entryPrice: [
    Css({ selector: ".YMlIz.FpEdX span" }),
    Css({ selector: ".FpEdX span" }),
    Css({ selector: ".YMlIz.FpEdX" })
  ],
  entryCarrier: [
    Css({ selector: "div.sSHqwe.tPgKwe.ogfYpf span" }),
    Css({ selector: ".sSHqwe" })
  ],
  entryStops: [
    Css({ selector: ".BbR8Ec .ogfYpf" }),
    Css({ selector: ".EfT7Ae span" }),
    Css({ selector: ".EfT7Ae" })
  ],
  entryDuration: [
    Css({ selector: "div.gvkrdb" }),
    Css({ selector: ".Ak5kof div" })
  ],
  entryDepartureDate: [
    Attribute({ selector: "[data-departure-date]", name: "data-departure-date" }),
    Attribute({ selector: "div.JMc5Xc", name: "aria-label" })
  ],
  entryReturnDate: [Attribute({ selector: "[data-return-date]", name: "data-return-date" })],
  pageDepartureDate: [
    Attribute({ selector: "input[aria-label=\"Departure\"]", name: "value" }),
    Attribute({ selector: "input[placeholder=\"Departure\"]", name: "value" })
  ],
  pageReturnDate: [
    Attribute({ selector: "input[aria-label=\"Return\"]", name: "value" }),
    Attribute({ selector: "input[placeholder=\"Return\"]", name: "value" })
  ]
}

/**
 * Applies configured overrides on top of the built-in rules
 */
export const makeLocatorRegistry = (
  overrides: Partial<Record<ElementName, LocatorRules>> = {}
): LocatorRegistry => ({ ...defaultLocators, ...overrides })

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Selector for the live page (Playwright CSS engine with :has-text) */
export const toPageSelector = (rule: LocatorRule): string => {
  switch (rule._tag) {
    case "Css":
    case "Attribute":
      return rule.selector
    case "Text":
      return rule.labels.map((label) => `${rule.tag}:has-text(${JSON.stringify(label)})`).join(", ")
  }
}

/** Selector for an HTML snapshot (cheerio / css-select with :contains) */
export const toDocumentSelector = (rule: LocatorRule): string => {
  switch (rule._tag) {
    case "Css":
    case "Attribute":
      return rule.selector
    case "Text":
      return rule.labels.map((label) => `${rule.tag}:contains(${JSON.stringify(label)})`).join(", ")
  }
}

/** One selector matching whatever any of the rules matches */
export const anyPageSelector = (rules: ReadonlyArray<LocatorRule>): string =>
  rules.map(toPageSelector).join(", ")

/** Short label for logs */
export const describeRule = (rule: LocatorRule): string =>
  rule._tag === "Text" ? `${rule.tag}[text~${rule.labels.join("|")}]` : rule.selector

// ---------------------------------------------------------------------------
// Snapshot lookups
// ---------------------------------------------------------------------------

type Selection = cheerio.Cheerio<cheerio.AnyNode>

/**
 * Matches of the first rule that matches anything inside `scope`
 */
export const selectFirstMatching = <T extends cheerio.AnyNode>(
  scope: cheerio.Cheerio<T>,
  rules: ReadonlyArray<LocatorRule>
): Selection | undefined => {
  for (const rule of rules) {
    const selector = toDocumentSelector(rule)
    const matches = scope.find(selector).addBack(selector)
    if (matches.length > 0) return matches
  }
  return undefined
}

/**
 * Reads a field value: the first rule producing non-empty text wins.
 * Attribute rules read the attribute, the others the element text.
 */
export const readField = <T extends cheerio.AnyNode>(
  scope: cheerio.Cheerio<T>,
  rules: ReadonlyArray<LocatorRule>
): string | undefined => {
  for (const rule of rules) {
    const selector = toDocumentSelector(rule)
    const element = scope.find(selector).addBack(selector).first()
    if (element.length === 0) continue

    const value = rule._tag === "Attribute" ? element.attr(rule.name) : element.text()
    const normalized = value?.replace(/\s+/g, " ").trim()
    if (normalized) return normalized
  }
  return undefined
}
