/**
 * Feet-and-inches helpers for lengths.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { defaultAbbreviation } from "./Abbreviations.js"
import { formatNumber, type Culture } from "./Culture.js"
import type { AbbreviationNotFoundError, UnitNotFoundError } from "./Errors.js"
import { add, as, make, type Quantity } from "./Quantity.js"
import { findUnit, type UnitTable } from "./UnitTable.js"

const INCHES_PER_FOOT = 12

/**
 * A length split into whole feet and the remaining inches.
 *
 * @since 0.1.0
 * @category Models
 */
export interface FeetInches {
  readonly feet: number
  readonly inches: number
}

const splitInches = (totalInches: number): FeetInches => {
  const feet = Math.floor(totalInches / INCHES_PER_FOOT)
  return { feet, inches: totalInches - feet * INCHES_PER_FOOT }
}

/**
 * Split a length into whole feet (rounded down) and the remainder in inches,
 * so `feet * 12 + inches` is the total length in inches. The remainder is
 * never negative: a negative length borrows a whole foot instead of carrying
 * the sign into the inches.
 *
 * @since 0.1.0
 * @category Conversions
 * @example
 * ```ts
 * yield* toFeetInches(table, make(28, inch)) // { feet: 2, inches: 4 }
 * yield* toFeetInches(table, make(-28, inch)) // { feet: -3, inches: 8 }
 * ```
 */
export const toFeetInches = (
  table: UnitTable,
  length: Quantity<"Length">,
): Effect.Effect<FeetInches, UnitNotFoundError> =>
  Effect.map(findUnit(table, "Length", "Inch"), (inch) => splitInches(as(length, inch)))

/**
 * Length of `feet` feet plus `inches` inches, expressed in feet.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const fromFeetInches = (
  table: UnitTable,
  feet: number,
  inches: number,
): Effect.Effect<Quantity<"Length">, UnitNotFoundError> =>
  Effect.gen(function* () {
    const foot = yield* findUnit(table, "Length", "Foot")
    const inch = yield* findUnit(table, "Length", "Inch")
    return add(make(feet, foot), make(inches, inch))
  })

/**
 * Render a length as `"<feet> ft <inches> in"`. The total is rounded to whole
 * inches before it is split.
 *
 * @since 0.1.0
 * @category Formatting
 */
export const formatFeetInches = (
  table: UnitTable,
  length: Quantity<"Length">,
  culture: Culture,
): Effect.Effect<string, UnitNotFoundError | AbbreviationNotFoundError> =>
  Effect.gen(function* () {
    const foot = yield* findUnit(table, "Length", "Foot")
    const inch = yield* findUnit(table, "Length", "Inch")
    // Round before splitting so 35.6 in reads 3 ft 0 in.
    const { feet, inches } = splitInches(Math.round(as(length, inch)))
    const footAbbreviation = yield* defaultAbbreviation(table, foot, culture.name)
    const inchAbbreviation = yield* defaultAbbreviation(table, inch, culture.name)
    return `${formatNumber(feet, culture)} ${footAbbreviation} ${formatNumber(inches, culture)} ${inchAbbreviation}`
  })
