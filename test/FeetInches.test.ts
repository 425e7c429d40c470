import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { EnglishUnitedStates, GermanGermany } from "../src/Culture.js"
import { formatFeetInches, fromFeetInches, toFeetInches } from "../src/FeetInches.js"
import { baseValue, make } from "../src/Quantity.js"
import { table, unit } from "./fixtures.js"

const inch = unit("Length", "Inch")
const meter = unit("Length", "Meter")

describe("FeetInches", () => {
  it.effect("splits a length into whole feet and remaining inches", () =>
    Effect.gen(function* () {
      expect(yield* toFeetInches(table, make(28, inch))).toEqual({ feet: 2, inches: 4 })

      const metric = yield* toFeetInches(table, make(1, meter))
      expect(metric.feet).toBe(3)
      expect(metric.inches).toBeCloseTo(3.3700787401574803, 10)
    }))

  it.effect("rounds feet down for negative lengths and keeps the inches positive", () =>
    Effect.gen(function* () {
      const split = yield* toFeetInches(table, make(-28, inch))
      expect(split).toEqual({ feet: -3, inches: 8 })
      expect(split.feet * 12 + split.inches).toBe(-28)
    }))

  it.effect("builds a length in feet", () =>
    Effect.gen(function* () {
      const length = yield* fromFeetInches(table, 2, 4)
      expect(length.unit.name).toBe("Foot")
      expect(length.value).toBeCloseTo(2.3333333333, 9)
      expect(baseValue(length)).toBeCloseTo(0.7112, 12)
    }))

  it.effect("formats with rounded numbers and default abbreviations", () =>
    Effect.gen(function* () {
      const length = yield* fromFeetInches(table, 2, 4)
      expect(yield* formatFeetInches(table, length, EnglishUnitedStates)).toBe("2 ft 4 in")
      expect(yield* formatFeetInches(table, make(-28, inch), GermanGermany)).toBe("-3 ft 8 in")
      expect(yield* formatFeetInches(table, make(1, meter), EnglishUnitedStates)).toBe("3 ft 3 in")
    }))

  it.effect("carries rounded inches into the next foot", () =>
    Effect.gen(function* () {
      expect(yield* formatFeetInches(table, make(35.6, inch), EnglishUnitedStates)).toBe("3 ft 0 in")
      expect(yield* formatFeetInches(table, make(11.6, inch), EnglishUnitedStates)).toBe("1 ft 0 in")
      expect(yield* formatFeetInches(table, make(-35.6, inch), EnglishUnitedStates)).toBe("-3 ft 0 in")
      expect(yield* formatFeetInches(table, make(35.4, inch), EnglishUnitedStates)).toBe("2 ft 11 in")
    }))
})
