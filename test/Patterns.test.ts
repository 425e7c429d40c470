import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { Culture, EnglishUnitedStates, GermanGermany, numberPattern, RussianRussia } from "../src/Culture.js"
import { NoAbbreviationsForUnitError, UnitNotFoundError } from "../src/Errors.js"
import { buildCompositePattern, buildUnitPattern, makePatternCache, unitPatternSource } from "../src/Patterns.js"
import { compositesOf } from "../src/UnitTable.js"
import { makeRussianOnlyTable, table, unit } from "./fixtures.js"

const english = numberPattern(EnglishUnitedStates)

describe("Patterns", () => {
  it("joins escaped abbreviations after the number", () => {
    expect(unitPatternSource(EnglishUnitedStates, ["gal (U.S.)", "gal"], false)).toBe(
      `(${english})\\s*(gal \\(U\\.S\\.\\)|gal)`,
    )
    expect(unitPatternSource(EnglishUnitedStates, ["kg"], true)).toBe(`^(${english})\\s*(kg)$`)
  })

  it.effect("builds anchored and embeddable unit patterns", () =>
    Effect.gen(function* () {
      expect(yield* buildUnitPattern(table, "Mass", "Kilogram", EnglishUnitedStates, true)).toBe(
        `^(${english})\\s*(kg)$`,
      )
      expect(yield* buildUnitPattern(table, "Length", "Meter", RussianRussia, false)).toBe(
        `(${numberPattern(RussianRussia)})\\s*(м)`,
      )
    }))

  it.effect("escapes regular expression syntax in abbreviations", () =>
    Effect.gen(function* () {
      const source = yield* buildUnitPattern(table, "Torque", "NewtonMeter", EnglishUnitedStates, true)
      expect(source.endsWith("\\s*(N·m|N\\*m|Nm)$")).toBe(true)
      expect(new RegExp(source, "u").test("12 N*m")).toBe(true)
    }))

  it.effect("fails for units that are unknown or have nothing to match", () =>
    Effect.gen(function* () {
      const unknown = yield* buildUnitPattern(table, "Length", "Furlong", EnglishUnitedStates, true).pipe(Effect.flip)
      expect(unknown).toBeInstanceOf(UnitNotFoundError)

      const russianOnly = yield* makeRussianOnlyTable()
      const empty = yield* buildUnitPattern(russianOnly, "Length", "Meter", GermanGermany, true).pipe(Effect.flip)
      expect(empty).toBeInstanceOf(NoAbbreviationsForUnitError)
      expect(empty).toMatchObject({ quantityType: "Length", unit: "Meter", culture: "de-DE" })
    }))

  it.effect("builds composite patterns with one named group per part", () =>
    Effect.gen(function* () {
      const [feetInches] = compositesOf(table, "Length")
      expect(feetInches).toBeDefined()
      if (feetInches === undefined) return

      const pattern = yield* buildCompositePattern(table, "Length", feetInches, EnglishUnitedStates)
      expect(pattern.source).toBe(
        `^(?<part0>(${english})\\s*(ft|'|′))\\s?(?<part1>(${english})\\s*(in|"|″))$`,
      )
      expect(pattern.parts.map((part) => [part.group, part.unit.name])).toEqual([
        ["part0", "Foot"],
        ["part1", "Inch"],
      ])
      expect(pattern.regex.exec(`2 ft 4 in`)?.groups).toEqual({ part0: "2 ft", part1: "4 in" })
    }))

  it.effect("caches compiled patterns per unit and culture", () =>
    Effect.gen(function* () {
      const cache = yield* makePatternCache(table, 16)
      const kilogram = unit("Mass", "Kilogram")

      const first = yield* cache.unitPattern(kilogram, EnglishUnitedStates)
      const second = yield* cache.unitPattern(kilogram, EnglishUnitedStates)
      const copy = yield* cache.unitPattern(
        kilogram,
        new Culture({ name: "en-US", decimalSeparator: ".", groupSeparator: ",", negativeSign: "-" }),
      )
      const german = yield* cache.unitPattern(kilogram, GermanGermany)

      expect(second).toBe(first)
      expect(copy).toBe(first)
      expect(german).not.toBe(first)
      expect(first.regex.test("5 kg")).toBe(true)
      expect(german.regex.test("1,5 kg")).toBe(true)
    }))
})
