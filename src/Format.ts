/**
 * Quantity formatting.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { defaultAbbreviation } from "./Abbreviations.js"
import { formatNumber, type Culture } from "./Culture.js"
import type { AbbreviationNotFoundError } from "./Errors.js"
import type { Quantity } from "./Quantity.js"
import type { UnitTable } from "./UnitTable.js"

/**
 * Render a quantity as `"<number> <abbreviation>"`, using the culture's number
 * format and the unit's first declared abbreviation. The output parses back to
 * the same quantity.
 *
 * @since 0.1.0
 * @category Formatting
 * @example
 * ```ts
 * yield* formatQuantity(table, make(-1.5, kilogram), GermanGermany) // "-1,5 kg"
 * ```
 */
export const formatQuantity = (
  table: UnitTable,
  quantity: Quantity,
  culture: Culture,
): Effect.Effect<string, AbbreviationNotFoundError> =>
  Effect.map(
    defaultAbbreviation(table, quantity.unit, culture.name),
    (abbreviation) => `${formatNumber(quantity.value, culture)} ${abbreviation}`,
  )
