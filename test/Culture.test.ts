import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import {
  Culture,
  EnglishUnitedStates,
  findCulture,
  formatNumber,
  GermanGermany,
  NorwegianBokmal,
  numberPattern,
  parseNumber,
  RussianRussia,
} from "../src/Culture.js"
import { UnknownCultureError } from "../src/Errors.js"

describe("Culture", () => {
  it("builds the en-US number pattern", () => {
    expect(numberPattern(EnglishUnitedStates)).toBe(
      "(?:-|\\+)?(?:(?:\\d{1,3}(?:,\\d{3})+|\\d+)(?:\\.\\d+)?|\\.\\d+)(?:[eE][-+]?\\d+)?",
    )
  })

  it("parses grouped and fractional numbers per culture", () => {
    expect(parseNumber("1,234.5", EnglishUnitedStates)).toEqual(Option.some(1234.5))
    expect(parseNumber("1.234,5", GermanGermany)).toEqual(Option.some(1234.5))
    expect(parseNumber("1\u00a0000,5", RussianRussia)).toEqual(Option.some(1000.5))
    expect(parseNumber(".5", EnglishUnitedStates)).toEqual(Option.some(0.5))
    expect(parseNumber("+3", EnglishUnitedStates)).toEqual(Option.some(3))
    expect(parseNumber("1.5e3", EnglishUnitedStates)).toEqual(Option.some(1500))
  })

  it("rejects text that is not a whole number in the culture", () => {
    expect(parseNumber("1.5", GermanGermany)).toEqual(Option.none())
    expect(parseNumber("12,34", EnglishUnitedStates)).toEqual(Option.none())
    expect(parseNumber("", EnglishUnitedStates)).toEqual(Option.none())
    expect(parseNumber("1e999", EnglishUnitedStates)).toEqual(Option.none())
  })

  it("uses the culture's own negative sign", () => {
    expect(parseNumber("\u22122,5", NorwegianBokmal)).toEqual(Option.some(-2.5))
    expect(parseNumber("-2,5", NorwegianBokmal)).toEqual(Option.none())
    expect(parseNumber("-2,5", GermanGermany)).toEqual(Option.some(-2.5))
  })

  it("formats with the shortest round-tripping representation", () => {
    expect(formatNumber(-1.5, GermanGermany)).toBe("-1,5")
    expect(formatNumber(-2.5, NorwegianBokmal)).toBe("\u22122,5")
    expect(formatNumber(1234.5, EnglishUnitedStates)).toBe("1234.5")
    expect(formatNumber(1e21, EnglishUnitedStates)).toBe("1e+21")
    expect(formatNumber(1.5e-7, GermanGermany)).toBe("1,5e-7")
  })

  it("rejects a culture whose separators coincide", () => {
    expect(() => new Culture({ name: "xx-XX", decimalSeparator: ".", groupSeparator: ".", negativeSign: "-" }))
      .toThrow()
  })

  it("allows cultures without grouping", () => {
    const plain = new Culture({ name: "xx-XX", decimalSeparator: ".", negativeSign: "-" })

    expect(parseNumber("1234.5", plain)).toEqual(Option.some(1234.5))
    expect(parseNumber("1,234.5", plain)).toEqual(Option.none())
  })

  it.effect("finds built-in cultures by name", () =>
    Effect.gen(function* () {
      const german = yield* findCulture("de-DE")
      expect(german.decimalSeparator).toBe(",")

      const error = yield* findCulture("xx-XX").pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnknownCultureError)
      expect(error.culture).toBe("xx-XX")
    }))
})
