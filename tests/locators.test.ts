/**
 * Tests for locator rule rendering and snapshot lookups.
 */

import * as cheerio from "cheerio"
import { describe, expect, test } from "vitest"
import {
  LocatorRule,
  anyPageSelector,
  defaultLocators,
  makeLocatorRegistry,
  readField,
  selectFirstMatching,
  toDocumentSelector,
  toPageSelector
} from "../src/services/locators"

const { Css, Text, Attribute } = LocatorRule

describe("selector rendering", () => {
  test("renders text rules per engine", () => {
    const rule = Text({ tag: "button", labels: ["Reject all", "Alle ablehnen"] })
    expect(toPageSelector(rule)).toBe(`button:has-text("Reject all"), button:has-text("Alle ablehnen")`)
    expect(toDocumentSelector(rule)).toBe(`button:contains("Reject all"), button:contains("Alle ablehnen")`)
  })

  test("css and attribute rules render their selector unchanged", () => {
    expect(toPageSelector(Css({ selector: "li.pIav2d" }))).toBe("li.pIav2d")
    expect(toDocumentSelector(Attribute({ selector: "div.JMc5Xc", name: "aria-label" }))).toBe("div.JMc5Xc")
  })

  test("joins fallbacks into one page selector", () => {
    expect(anyPageSelector([Css({ selector: "#a" }), Css({ selector: ".b" })])).toBe("#a, .b")
  })
})

describe("snapshot lookups", () => {
  const $ = cheerio.load(`
    <ul class="Rk10dc">
      <li class="pIav2d" data-departure-date="2026-03-02"><div class="sSHqwe">  Austrian
        Airlines </div></li>
      <li class="pIav2d"><div class="sSHqwe"></div><div class="alt">Lufthansa</div></li>
    </ul>`)

  test("falls through to the first rule that matches", () => {
    const items = selectFirstMatching($.root(), [Css({ selector: "li.gone" }), Css({ selector: "li.pIav2d" })])
    expect(items?.length).toBe(2)
    expect(selectFirstMatching($.root(), [Css({ selector: "li.gone" })])).toBeUndefined()
  })

  test("reads text with whitespace collapsed", () => {
    const first = $("li.pIav2d").first()
    expect(readField(first, [Css({ selector: ".sSHqwe" })])).toBe("Austrian Airlines")
  })

  test("skips rules that yield empty text", () => {
    const second = $("li.pIav2d").last()
    expect(readField(second, [Css({ selector: ".sSHqwe" }), Css({ selector: ".alt" })])).toBe("Lufthansa")
  })

  test("reads attributes from the scope element itself", () => {
    const first = $("li.pIav2d").first()
    expect(readField(first, [Attribute({ selector: "[data-departure-date]", name: "data-departure-date" })]))
      .toBe("2026-03-02")
  })
})

describe("makeLocatorRegistry", () => {
  test("replaces only the overridden elements", () => {
    const registry = makeLocatorRegistry({ resultItem: [Css({ selector: "article.flight" })] })
    expect(registry.resultItem).toEqual([Css({ selector: "article.flight" })])
    expect(registry.entryPrice).toBe(defaultLocators.entryPrice)
  })
})
