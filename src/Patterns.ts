/**
 * Pattern builder and pattern cache.
 *
 * A unit pattern is `(<number>)\s*(<abbreviations>)`: the culture's number
 * pattern, optional whitespace, then the escaped abbreviations longest first.
 * Capture groups are unnamed so fragments can sit side by side inside a
 * composite pattern, whose parts are named `part0`, `part1`, ... and joined by
 * the grammar's separator patterns.
 *
 * Compiled patterns are cached per (unit, culture) and per (grammar, culture)
 * for the lifetime of the cache; the unit table is immutable, so a cached entry
 * never goes stale.
 *
 * @since 0.1.0
 */

import { Cache, Data, Duration, Effect } from "effect"
import { unitAbbreviations } from "./Abbreviations.js"
import { numberPattern, type Culture } from "./Culture.js"
import { NoAbbreviationsForUnitError, type UnitNotFoundError } from "./Errors.js"
import { alternation, compile } from "./internal/regex.js"
import type { QuantityTypeName } from "./Types.js"
import { findUnit, type CompositeGrammar, type Unit, type UnitTable } from "./UnitTable.js"

/**
 * Compiled, anchored pattern for a single unit. Group 1 holds the number,
 * group 2 the abbreviation.
 *
 * @since 0.1.0
 * @category Patterns
 */
export interface UnitPattern {
  readonly unit: Unit
  readonly source: string
  readonly regex: RegExp
}

/**
 * Named capture group of a composite pattern and the unit it must parse as.
 *
 * @since 0.1.0
 * @category Patterns
 */
export interface CompositePatternPart {
  readonly group: string
  readonly unit: Unit
}

/**
 * Compiled, anchored pattern for a composite grammar.
 *
 * @since 0.1.0
 * @category Patterns
 */
export interface CompositePattern {
  readonly grammar: CompositeGrammar
  readonly source: string
  readonly regex: RegExp
  readonly parts: ReadonlyArray<CompositePatternPart>
}

/**
 * Pattern source for a unit from already resolved abbreviations.
 *
 * @since 0.1.0
 * @category Patterns
 */
export const unitPatternSource = (
  culture: Culture,
  abbreviations: ReadonlyArray<string>,
  matchEntireString: boolean,
): string => {
  const fragment = `(${numberPattern(culture)})\\s*(${alternation(abbreviations)})`
  return matchEntireString ? `^${fragment}$` : fragment
}

/**
 * @since 0.1.0
 * @category Patterns
 */
export const patternForUnit = (
  table: UnitTable,
  unit: Unit,
  culture: Culture,
  matchEntireString: boolean,
): Effect.Effect<string, NoAbbreviationsForUnitError> =>
  unitAbbreviations(table, unit, culture.name).pipe(
    Effect.mapError(() =>
      new NoAbbreviationsForUnitError({ quantityType: unit.quantityType, unit: unit.name, culture: culture.name }),
    ),
    Effect.map((abbreviations) => unitPatternSource(culture, abbreviations, matchEntireString)),
  )

/**
 * Pattern source matching a number followed by one of the unit's
 * abbreviations. Anchored with `^…$` when `matchEntireString` is set, bare
 * otherwise so it can be embedded in a larger pattern.
 *
 * @since 0.1.0
 * @category Patterns
 * @example
 * ```ts
 * yield* buildUnitPattern(table, "Mass", "Kilogram", EnglishUnitedStates, false)
 * // "((?:-|\\+)?(?:…)(?:[eE][-+]?\\d+)?)\\s*(kg)"
 * ```
 */
export const buildUnitPattern = (
  table: UnitTable,
  quantityType: QuantityTypeName,
  unit: string,
  culture: Culture,
  matchEntireString: boolean,
): Effect.Effect<string, UnitNotFoundError | NoAbbreviationsForUnitError> =>
  Effect.flatMap(findUnit(table, quantityType, unit), (found) =>
    patternForUnit(table, found, culture, matchEntireString))

/**
 * @since 0.1.0
 * @category Patterns
 */
export const compileUnitPattern = (
  table: UnitTable,
  unit: Unit,
  culture: Culture,
): Effect.Effect<UnitPattern, NoAbbreviationsForUnitError> =>
  Effect.map(patternForUnit(table, unit, culture, true), (source) => ({
    unit,
    source,
    regex: compile(source),
  }))

/**
 * Build the anchored pattern of a composite grammar from the non-anchored
 * patterns of its parts.
 *
 * @since 0.1.0
 * @category Patterns
 */
export const buildCompositePattern = (
  table: UnitTable,
  quantityType: QuantityTypeName,
  grammar: CompositeGrammar,
  culture: Culture,
): Effect.Effect<CompositePattern, UnitNotFoundError | NoAbbreviationsForUnitError> =>
  Effect.gen(function* () {
    const parts = yield* Effect.forEach(grammar.parts, (part, index) =>
      Effect.gen(function* () {
        const unit = yield* findUnit(table, quantityType, part.unit)
        const fragment = yield* patternForUnit(table, unit, culture, false)
        return { group: `part${index}`, unit, fragment, separator: part.separator }
      }))
    const body = parts
      .map((part, index) => {
        const group = `(?<${part.group}>${part.fragment})`
        return index < parts.length - 1 ? `${group}${part.separator}` : group
      })
      .join("")
    const source = `^${body}$`
    return {
      grammar,
      source,
      regex: compile(source),
      parts: parts.map(({ group, unit }) => ({ group, unit })),
    }
  })

/**
 * Compute-or-fetch access to compiled patterns.
 *
 * @since 0.1.0
 * @category Cache
 */
export interface PatternCache {
  readonly unitPattern: (unit: Unit, culture: Culture) => Effect.Effect<UnitPattern, NoAbbreviationsForUnitError>
  readonly compositePattern: (
    quantityType: QuantityTypeName,
    grammar: CompositeGrammar,
    culture: Culture,
  ) => Effect.Effect<CompositePattern, UnitNotFoundError | NoAbbreviationsForUnitError>
}

interface UnitPatternKey {
  readonly unit: Unit
  readonly culture: Culture
}

interface CompositePatternKey {
  readonly quantityType: QuantityTypeName
  readonly grammar: CompositeGrammar
  readonly culture: Culture
}

/**
 * Create a pattern cache over a unit table. Concurrent lookups of the same key
 * share a single computation; failures are cached too.
 *
 * @since 0.1.0
 * @category Cache
 */
export const makePatternCache = (
  table: UnitTable,
  capacity: number,
): Effect.Effect<PatternCache> =>
  Effect.gen(function* () {
    const units = yield* Cache.make({
      capacity,
      timeToLive: Duration.infinity,
      lookup: ({ unit, culture }: UnitPatternKey) =>
        compileUnitPattern(table, unit, culture).pipe(
          Effect.tap(() => Effect.logDebug("Compiled unit pattern")),
          Effect.tapError((error) => Effect.logDebug(error.message)),
          Effect.annotateLogs({ quantityType: unit.quantityType, unit: unit.name, culture: culture.name }),
        ),
    })
    const composites = yield* Cache.make({
      capacity,
      timeToLive: Duration.infinity,
      lookup: ({ quantityType, grammar, culture }: CompositePatternKey) =>
        buildCompositePattern(table, quantityType, grammar, culture).pipe(
          Effect.tap(() => Effect.logDebug("Compiled composite pattern")),
          Effect.annotateLogs({ quantityType, grammar: grammar.name, culture: culture.name }),
        ),
    })

    return {
      unitPattern: (unit, culture) => units.get(Data.struct({ unit, culture })),
      compositePattern: (quantityType, grammar, culture) =>
        composites.get(Data.struct({ quantityType, grammar, culture })),
    }
  })
