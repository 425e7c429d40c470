import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import * as FastCheck from "effect/FastCheck"
import { builtinCultures, EnglishUnitedStates } from "../src/Culture.js"
import { formatQuantity } from "../src/Format.js"
import { tryParse } from "../src/Parser.js"
import { makePatternCache } from "../src/Patterns.js"
import { equals, make } from "../src/Quantity.js"
import { table } from "./fixtures.js"

const values = FastCheck.double({ min: -1e9, max: 1e9, noNaN: true })

describe("parsing properties", () => {
  it.effect("format then parse restores every unit in every culture", () =>
    Effect.gen(function* () {
      const patterns = yield* makePatternCache(table, 4096)
      const context = { table, patterns }

      for (const culture of builtinCultures.values()) {
        for (const unit of table.units) {
          const samples = FastCheck.sample(values, { numRuns: 8, seed: 7 })
          for (const value of samples) {
            const written = make(value, unit)
            const text = yield* formatQuantity(table, written, culture)
            const parsed = yield* tryParse(context, text, unit.quantityType, culture)

            expect(Option.map(parsed, (quantity) => quantity.unit.name), `${culture.name}: ${text}`).toEqual(
              Option.some(unit.name),
            )
            expect(Option.exists(parsed, (quantity) => equals(quantity, written))).toBe(true)
          }
        }
      }
    }))

  it.effect("resolves a shared abbreviation to the first-declared unit for any value", () =>
    Effect.gen(function* () {
      const patterns = yield* makePatternCache(table, 64)
      const samples = FastCheck.sample(FastCheck.double({ min: 0, max: 1e6, noNaN: true }), { numRuns: 50, seed: 11 })

      for (const value of samples) {
        const parsed = yield* tryParse({ table, patterns }, `${value} gal`, "Volume", EnglishUnitedStates)
        expect(Option.map(parsed, (quantity) => quantity.unit.name)).toEqual(Option.some("UsGallon"))
      }
    }))
})
