import { Effect, Schema } from "effect"
import type { UnitTableError } from "../src/Errors.js"
import type { ParserContext } from "../src/Parser.js"
import { makePatternCache } from "../src/Patterns.js"
import type { QuantityTypeName } from "../src/Types.js"
import { findUnit, loadUnitTable, makeUnitTable, UnitTableDefinition, type Unit, type UnitTable } from "../src/UnitTable.js"

const decodeDefinition = Schema.decodeUnknownSync(UnitTableDefinition)

/**
 * The shipped table, loaded once per test file.
 */
export const table: UnitTable = Effect.runSync(loadUnitTable())

/**
 * Look up a unit of the shipped table, throwing when it is missing.
 */
export const unit = <Q extends QuantityTypeName>(quantityType: Q, name: string): Unit<Q> =>
  Effect.runSync(findUnit(table, quantityType, name))

/**
 * Fresh parser context over the shipped table.
 */
export const parserContext: Effect.Effect<ParserContext> = Effect.map(
  makePatternCache(table, 256),
  (patterns) => ({ table, patterns }),
)

/**
 * Minimal Length table whose base unit has no abbreviation in the default culture.
 */
export const makeRussianOnlyTable = (): Effect.Effect<UnitTable, UnitTableError> =>
  makeUnitTable(
    decodeDefinition({
      defaultCulture: "en-US",
      prefixes: [],
      quantities: [
        {
          name: "Length",
          baseUnit: "Meter",
          units: [
            { name: "Meter", factor: 1, abbreviations: { "ru-RU": ["м"] } },
            { name: "Foot", factor: 0.3048, abbreviations: { "en-US": ["ft"] } },
          ],
        },
      ],
    }),
  )

export const decodeTableDefinition = decodeDefinition
