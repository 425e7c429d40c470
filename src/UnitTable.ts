/**
 * Unit definition table: schema-backed unit definitions and the immutable
 * runtime table built from them.
 *
 * Every quantity type has exactly one base unit; every other unit converts
 * through it with `toBase(x) = (x + offset) * factor` and its inverse. A unit
 * that declares metric prefixes materialises one derived unit per prefix
 * (Gram + Kilo becomes Kilogram), listed right after the unit that declares
 * it. Derived units never take further prefixes.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { Effect, Option, Schema } from "effect"
import type { ParseResult } from "effect"
import { UnitNotFoundError, UnitTableError } from "./Errors.js"
import { CultureName, QuantityTypeName } from "./Types.js"

const AbbreviationLists = Schema.Record({
  key: Schema.String,
  value: Schema.Array(Schema.NonEmptyString).pipe(Schema.minItems(1)),
})

/**
 * Metric prefix with its per-culture abbreviation.
 *
 * @since 0.1.0
 * @category Definitions
 */
export class PrefixDefinition extends Schema.Class<PrefixDefinition>("PrefixDefinition")({
  name: Schema.NonEmptyTrimmedString,
  exponent: Schema.Int,
  abbreviations: Schema.Record({ key: Schema.String, value: Schema.NonEmptyString }),
}) {}

/**
 * Declarative unit definition as stored in the table file.
 *
 * @since 0.1.0
 * @category Definitions
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  name: Schema.NonEmptyTrimmedString,
  factor: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
  offset: Schema.optionalWith(Schema.Number.pipe(Schema.finite()), { default: () => 0 }),
  prefixes: Schema.optionalWith(Schema.Array(Schema.NonEmptyTrimmedString), { default: () => [] }),
  abbreviations: AbbreviationLists,
}) {}

/**
 * One part of a composite grammar: the sub-unit and the pattern separating it
 * from the next part.
 *
 * @since 0.1.0
 * @category Definitions
 */
export class CompositePart extends Schema.Class<CompositePart>("CompositePart")({
  unit: Schema.NonEmptyTrimmedString,
  separator: Schema.optionalWith(Schema.String, { default: () => "" }),
}) {}

/**
 * Ordered sequence of sub-units that together spell one quantity, such as
 * feet followed by inches.
 *
 * @since 0.1.0
 * @category Definitions
 */
export class CompositeGrammar extends Schema.Class<CompositeGrammar>("CompositeGrammar")({
  name: Schema.NonEmptyTrimmedString,
  parts: Schema.Array(CompositePart),
}) {}

/**
 * @since 0.1.0
 * @category Definitions
 */
export class QuantityDefinition extends Schema.Class<QuantityDefinition>("QuantityDefinition")({
  name: QuantityTypeName,
  baseUnit: Schema.NonEmptyTrimmedString,
  units: Schema.Array(UnitDefinition),
  composites: Schema.optionalWith(Schema.Array(CompositeGrammar), { default: () => [] }),
}) {}

/**
 * Complete table definition as read from `data/units.json`.
 *
 * @since 0.1.0
 * @category Definitions
 */
export class UnitTableDefinition extends Schema.Class<UnitTableDefinition>("UnitTableDefinition")({
  defaultCulture: CultureName,
  prefixes: Schema.Array(PrefixDefinition),
  quantities: Schema.Array(QuantityDefinition),
}) {}

/**
 * Where a unit's abbreviations come from: declared directly, or synthesised
 * from the declaring unit's abbreviations and a prefix.
 *
 * @since 0.1.0
 * @category Units
 */
export type AbbreviationSource =
  | {
    readonly _tag: "Declared"
    readonly byCulture: Readonly<Record<string, ReadonlyArray<string>>>
  }
  | {
    readonly _tag: "Prefixed"
    readonly prefix: PrefixDefinition
    readonly byCulture: Readonly<Record<string, ReadonlyArray<string>>>
  }

/**
 * Runtime unit of one quantity type.
 *
 * @since 0.1.0
 * @category Units
 */
export interface Unit<Q extends QuantityTypeName = QuantityTypeName> {
  readonly name: string
  readonly quantityType: Q
  readonly factor: number
  readonly offset: number
  readonly abbreviations: AbbreviationSource
  readonly toBase: (value: number) => number
  readonly fromBase: (value: number) => number
}

/**
 * Immutable runtime table. Units are kept in declaration order, which is the
 * order the parser tries them in.
 *
 * @since 0.1.0
 * @category Units
 */
export interface UnitTable {
  readonly defaultCulture: string
  readonly quantityTypes: ReadonlyArray<QuantityTypeName>
  readonly units: ReadonlyArray<Unit>
  readonly baseUnits: ReadonlyMap<QuantityTypeName, Unit>
  readonly composites: ReadonlyMap<QuantityTypeName, ReadonlyArray<CompositeGrammar>>
}

const BASE_UNIT_TOLERANCE = 1e-12

const makeUnit = (
  quantityType: QuantityTypeName,
  name: string,
  factor: number,
  offset: number,
  abbreviations: AbbreviationSource,
): Unit => ({
  name,
  quantityType,
  factor,
  offset,
  abbreviations,
  toBase: (value) => (value + offset) * factor,
  fromBase: (value) => value / factor - offset,
})

const prefixedName = (prefix: PrefixDefinition, unit: string): string =>
  `${prefix.name}${unit.charAt(0).toLowerCase()}${unit.slice(1)}`

const expandUnits = (
  quantity: QuantityDefinition,
  prefixes: ReadonlyMap<string, PrefixDefinition>,
): Effect.Effect<ReadonlyArray<Unit>, UnitTableError> =>
  Effect.gen(function* () {
    const units: Array<Unit> = []
    for (const definition of quantity.units) {
      units.push(
        makeUnit(quantity.name, definition.name, definition.factor, definition.offset, {
          _tag: "Declared",
          byCulture: definition.abbreviations,
        }),
      )
      for (const prefixName of definition.prefixes) {
        const prefix = prefixes.get(prefixName)
        if (!prefix) {
          return yield* Effect.fail(
            new UnitTableError({ reason: `${quantity.name} unit ${definition.name} uses unknown prefix ${prefixName}` }),
          )
        }
        units.push(
          makeUnit(
            quantity.name,
            prefixedName(prefix, definition.name),
            definition.factor * 10 ** prefix.exponent,
            definition.offset,
            { _tag: "Prefixed", prefix, byCulture: definition.abbreviations },
          ),
        )
      }
    }
    const seen = new Set<string>()
    for (const unit of units) {
      if (seen.has(unit.name)) {
        return yield* Effect.fail(
          new UnitTableError({ reason: `${quantity.name} declares unit ${unit.name} more than once` }),
        )
      }
      seen.add(unit.name)
    }
    return units
  })

const ensureBaseUnit = (
  quantity: QuantityDefinition,
  units: ReadonlyArray<Unit>,
): Effect.Effect<Unit, UnitTableError> => {
  const base = units.find((unit) => unit.name === quantity.baseUnit)
  if (!base) {
    return Effect.fail(
      new UnitTableError({ reason: `${quantity.name} base unit ${quantity.baseUnit} is not declared` }),
    )
  }
  if (Math.abs(base.factor - 1) > BASE_UNIT_TOLERANCE || base.offset !== 0) {
    return Effect.fail(
      new UnitTableError({ reason: `${quantity.name} base unit ${base.name} must convert to itself` }),
    )
  }
  return Effect.succeed(base)
}

const ensureComposites = (
  quantity: QuantityDefinition,
  units: ReadonlyArray<Unit>,
): Effect.Effect<void, UnitTableError> => {
  for (const grammar of quantity.composites) {
    if (grammar.parts.length < 2) {
      return Effect.fail(
        new UnitTableError({ reason: `${quantity.name} composite ${grammar.name} needs at least two parts` }),
      )
    }
    const missing = grammar.parts.find((part) => !units.some((unit) => unit.name === part.unit))
    if (missing) {
      return Effect.fail(
        new UnitTableError({ reason: `${quantity.name} composite ${grammar.name} references unknown unit ${missing.unit}` }),
      )
    }
  }
  return Effect.void
}

/**
 * Build the runtime table from a decoded definition, validating base units,
 * prefixes and composite grammars.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnitTable = (
  definition: UnitTableDefinition,
): Effect.Effect<UnitTable, UnitTableError> =>
  Effect.gen(function* () {
    const prefixes = new Map(definition.prefixes.map((prefix) => [prefix.name, prefix] as const))
    const quantityTypes: Array<QuantityTypeName> = []
    const units: Array<Unit> = []
    const baseUnits = new Map<QuantityTypeName, Unit>()
    const composites = new Map<QuantityTypeName, ReadonlyArray<CompositeGrammar>>()

    for (const quantity of definition.quantities) {
      if (baseUnits.has(quantity.name)) {
        return yield* Effect.fail(new UnitTableError({ reason: `${quantity.name} is declared more than once` }))
      }
      const expanded = yield* expandUnits(quantity, prefixes)
      const base = yield* ensureBaseUnit(quantity, expanded)
      yield* ensureComposites(quantity, expanded)
      quantityTypes.push(quantity.name)
      units.push(...expanded)
      baseUnits.set(quantity.name, base)
      composites.set(quantity.name, quantity.composites)
    }

    return {
      defaultCulture: definition.defaultCulture,
      quantityTypes,
      units,
      baseUnits,
      composites,
    }
  })

/**
 * Location of the unit table shipped with the package.
 *
 * @since 0.1.0
 */
export const defaultUnitTablePath: string = fileURLToPath(new URL("../data/units.json", import.meta.url))

/**
 * Read, decode and build a unit table from a JSON file.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const loadUnitTable = (
  path: string = defaultUnitTablePath,
): Effect.Effect<UnitTable, UnitTableError | ParseResult.ParseError> =>
  Effect.gen(function* () {
    const text = yield* Effect.try({
      try: () => readFileSync(path, "utf8"),
      catch: (error) =>
        new UnitTableError({
          reason: `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
        }),
    })
    const definition = yield* Schema.decodeUnknown(Schema.parseJson(UnitTableDefinition))(text)
    return yield* makeUnitTable(definition)
  })

/**
 * Narrow a unit to a quantity type.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const isUnitOf =
  <Q extends QuantityTypeName>(quantityType: Q) =>
  (unit: Unit): unit is Unit<Q> =>
    unit.quantityType === quantityType

/**
 * Units of a quantity type in declaration order; empty when the table does not
 * register the type.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const unitsOf = <Q extends QuantityTypeName>(
  table: UnitTable,
  quantityType: Q,
): ReadonlyArray<Unit<Q>> => table.units.filter(isUnitOf(quantityType))

/**
 * @category Lookups
 * @since 0.1.0
 */
export const baseUnitOf = <Q extends QuantityTypeName>(
  table: UnitTable,
  quantityType: Q,
): Option.Option<Unit<Q>> =>
  Option.fromNullable(table.baseUnits.get(quantityType)).pipe(Option.filter(isUnitOf(quantityType)))

/**
 * @category Lookups
 * @since 0.1.0
 */
export const compositesOf = (
  table: UnitTable,
  quantityType: QuantityTypeName,
): ReadonlyArray<CompositeGrammar> => table.composites.get(quantityType) ?? []

/**
 * Find a unit of a quantity type by name.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const findUnit = <Q extends QuantityTypeName>(
  table: UnitTable,
  quantityType: Q,
  name: string,
): Effect.Effect<Unit<Q>, UnitNotFoundError> => {
  const unit = unitsOf(table, quantityType).find((candidate) => candidate.name === name)
  return unit ? Effect.succeed(unit) : Effect.fail(new UnitNotFoundError({ quantityType, unit: name }))
}
