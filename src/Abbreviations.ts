/**
 * Abbreviation resolver.
 *
 * Resolves the localized strings that denote a unit, expanding prefixed units
 * from the declaring unit's abbreviations, and answers the reverse question of
 * which units a string may denote. When a culture defines nothing for a unit
 * (or for a prefix) the table's default culture is used instead.
 *
 * @since 0.1.0
 */

import { Array as Arr, Effect, Option } from "effect"
import { AbbreviationNotFoundError, UnitNotFoundError } from "./Errors.js"
import type { QuantityTypeName } from "./Types.js"
import { findUnit, type Unit, type UnitTable } from "./UnitTable.js"

const inCulture = <A>(
  byCulture: Readonly<Record<string, A>>,
  culture: string,
  defaultCulture: string,
): Option.Option<A> =>
  Option.fromNullable(byCulture[culture]).pipe(
    Option.orElse(() => Option.fromNullable(byCulture[defaultCulture])),
  )

const declaredAbbreviations = (
  table: UnitTable,
  unit: Unit,
  culture: string,
): Option.Option<ReadonlyArray<string>> => {
  const source = unit.abbreviations
  const base = inCulture(source.byCulture, culture, table.defaultCulture)
  if (source._tag === "Declared") {
    return base
  }
  return Option.map(
    Option.all([inCulture(source.prefix.abbreviations, culture, table.defaultCulture), base]),
    ([prefix, abbreviations]) => abbreviations.map((abbreviation) => `${prefix}${abbreviation}`),
  )
}

const notFound = (unit: Unit, culture: string): AbbreviationNotFoundError =>
  new AbbreviationNotFoundError({ quantityType: unit.quantityType, unit: unit.name, culture })

// Declaration order, before sorting.
const resolveDeclared = (
  table: UnitTable,
  unit: Unit,
  culture: string,
): Effect.Effect<Arr.NonEmptyReadonlyArray<string>, AbbreviationNotFoundError> =>
  Option.match(Option.filter(declaredAbbreviations(table, unit, culture), Arr.isNonEmptyReadonlyArray), {
    onNone: () => Effect.fail(notFound(unit, culture)),
    onSome: Effect.succeed,
  })

const longestFirst = (abbreviations: ReadonlyArray<string>): ReadonlyArray<string> =>
  [...abbreviations].sort((a, b) => b.length - a.length)

/**
 * Abbreviations of a unit, longest first; equal lengths keep declaration order.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const unitAbbreviations = (
  table: UnitTable,
  unit: Unit,
  culture: string,
): Effect.Effect<ReadonlyArray<string>, AbbreviationNotFoundError> =>
  Effect.map(resolveDeclared(table, unit, culture), longestFirst)

/**
 * Abbreviations of a named unit of a quantity type, longest first.
 *
 * @category Resolution
 * @since 0.1.0
 * @example
 * ```ts
 * yield* abbreviationsFor(table, "Mass", "Kilogram", "en-US") // ["kg"]
 * ```
 */
export const abbreviationsFor = (
  table: UnitTable,
  quantityType: QuantityTypeName,
  unit: string,
  culture: string,
): Effect.Effect<ReadonlyArray<string>, UnitNotFoundError | AbbreviationNotFoundError> =>
  Effect.flatMap(findUnit(table, quantityType, unit), (found) => unitAbbreviations(table, found, culture))

/**
 * The first declared abbreviation of a unit, used when formatting.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const defaultAbbreviation = (
  table: UnitTable,
  unit: Unit,
  culture: string,
): Effect.Effect<string, AbbreviationNotFoundError> =>
  Effect.map(resolveDeclared(table, unit, culture), Arr.headNonEmpty)

/**
 * Every unit, across all quantity types, that `text` denotes exactly in the
 * culture. Units without abbreviations in the culture are skipped.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const unitsFor = (
  table: UnitTable,
  text: string,
  culture: string,
): Effect.Effect<ReadonlyArray<Unit>> =>
  Effect.filter(table.units, (unit) =>
    resolveDeclared(table, unit, culture).pipe(
      Effect.map((abbreviations) => abbreviations.includes(text)),
      Effect.orElseSucceed(() => false),
    ),
  )
