/**
 * Quantity engine service.
 *
 * Bundles a unit table, its pattern caches and its operator network behind a
 * `Context.Tag`. Every entry point takes an optional `Culture`; when omitted
 * the engine's default culture is used, read once from `QUANTITY_CULTURE`
 * when the layer is built.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Option } from "effect"
import { abbreviationsFor, unitsFor } from "./Abbreviations.js"
import { builtinCultures, findCulture, type Culture } from "./Culture.js"
import type {
  AbbreviationNotFoundError,
  NoAbbreviationsForUnitError,
  QuantityFormatError,
  QuantityParseError,
  UnitNotFoundError,
  UnknownCultureError,
} from "./Errors.js"
import { formatQuantity } from "./Format.js"
import { makeOperatorNetwork, type OperatorNetwork } from "./Operators.js"
import * as Parser from "./Parser.js"
import { buildUnitPattern, makePatternCache } from "./Patterns.js"
import type { Quantity } from "./Quantity.js"
import type { QuantityTypeName } from "./Types.js"
import { findUnit, loadUnitTable, type Unit, type UnitTable } from "./UnitTable.js"

/**
 * Engine configuration, read from the ambient `ConfigProvider`.
 *
 * @since 0.1.0
 * @category Config
 */
export const QuantityEngineConfig = Config.all({
  culture: Config.string("QUANTITY_CULTURE").pipe(Config.withDefault("en-US")),
  cacheCapacity: Config.integer("QUANTITY_PATTERN_CACHE_CAPACITY").pipe(
    Config.validate({ message: "Expected a positive capacity", validation: (capacity) => capacity > 0 }),
    Config.withDefault(4096),
  ),
})

/**
 * @since 0.1.0
 * @category Services
 */
export interface QuantityEngineService {
  readonly table: UnitTable
  readonly defaultCulture: Culture
  readonly operators: OperatorNetwork
  /** Registered culture by name; the default culture when `name` is omitted. */
  readonly culture: (name?: string) => Effect.Effect<Culture, UnknownCultureError>
  readonly unit: <Q extends QuantityTypeName>(
    quantityType: Q,
    name: string,
  ) => Effect.Effect<Unit<Q>, UnitNotFoundError>
  readonly abbreviationsFor: (
    quantityType: QuantityTypeName,
    unit: string,
    culture?: Culture,
  ) => Effect.Effect<ReadonlyArray<string>, UnitNotFoundError | AbbreviationNotFoundError>
  readonly unitsFor: (text: string, culture?: Culture) => Effect.Effect<ReadonlyArray<Unit>>
  readonly buildUnitPattern: (
    quantityType: QuantityTypeName,
    unit: string,
    matchEntireString: boolean,
    culture?: Culture,
  ) => Effect.Effect<string, UnitNotFoundError | NoAbbreviationsForUnitError>
  readonly parseUnit: <Q extends QuantityTypeName>(
    text: string,
    quantityType: Q,
    culture?: Culture,
  ) => Effect.Effect<Unit<Q>, UnitNotFoundError>
  readonly tryParse: <Q extends QuantityTypeName>(
    text: string,
    quantityType: Q,
    culture?: Culture,
  ) => Effect.Effect<Option.Option<Quantity<Q>>>
  readonly parse: <Q extends QuantityTypeName>(
    text: string,
    quantityType: Q,
    culture?: Culture,
  ) => Effect.Effect<Quantity<Q>, QuantityFormatError>
  readonly tryParseComposite: <Q extends QuantityTypeName>(
    text: string,
    quantityType: Q,
    culture?: Culture,
    grammarName?: string,
  ) => Effect.Effect<Option.Option<Quantity<Q>>>
  readonly parseComposite: <Q extends QuantityTypeName>(
    text: string,
    quantityType: Q,
    culture?: Culture,
    grammarName?: string,
  ) => Effect.Effect<Quantity<Q>, QuantityParseError>
  readonly format: (quantity: Quantity, culture?: Culture) => Effect.Effect<string, AbbreviationNotFoundError>
}

/**
 * @since 0.1.0
 * @category Services
 */
export interface QuantityEngineOptions {
  /** Table to serve; `data/units.json` is loaded when omitted. */
  readonly table?: UnitTable
  /** Cultures the engine can resolve by name; the built-ins when omitted. */
  readonly cultures?: ReadonlyMap<string, Culture>
}

const makeQuantityEngine = (options: QuantityEngineOptions) =>
  Effect.gen(function* () {
    const config = yield* QuantityEngineConfig
    const cultures = options.cultures ?? builtinCultures
    const table = options.table ?? (yield* loadUnitTable())
    const defaultCulture = yield* findCulture(config.culture, cultures)
    const patterns = yield* makePatternCache(table, config.cacheCapacity)
    const operators = yield* makeOperatorNetwork(table)
    const context: Parser.ParserContext = { table, patterns }

    yield* Effect.logDebug("Quantity engine ready").pipe(
      Effect.annotateLogs({
        culture: defaultCulture.name,
        cacheCapacity: config.cacheCapacity,
        units: table.units.length,
      }),
    )

    const service: QuantityEngineService = {
      table,
      defaultCulture,
      operators,
      culture: (name) => (name === undefined ? Effect.succeed(defaultCulture) : findCulture(name, cultures)),
      unit: (quantityType, name) => findUnit(table, quantityType, name),
      abbreviationsFor: (quantityType, unit, culture = defaultCulture) =>
        abbreviationsFor(table, quantityType, unit, culture.name),
      unitsFor: (text, culture = defaultCulture) => unitsFor(table, text, culture.name),
      buildUnitPattern: (quantityType, unit, matchEntireString, culture = defaultCulture) =>
        buildUnitPattern(table, quantityType, unit, culture, matchEntireString),
      parseUnit: (text, quantityType, culture = defaultCulture) => Parser.parseUnit(table, text, quantityType, culture),
      tryParse: (text, quantityType, culture = defaultCulture) =>
        Parser.tryParse(context, text, quantityType, culture),
      parse: (text, quantityType, culture = defaultCulture) => Parser.parse(context, text, quantityType, culture),
      tryParseComposite: (text, quantityType, culture = defaultCulture, grammarName) =>
        Parser.tryParseComposite(context, text, quantityType, culture, grammarName),
      parseComposite: (text, quantityType, culture = defaultCulture, grammarName) =>
        Parser.parseComposite(context, text, quantityType, culture, grammarName),
      format: (quantity, culture = defaultCulture) => formatQuantity(table, quantity, culture),
    }
    return service
  })

/**
 * Quantity engine service tag.
 *
 * @since 0.1.0
 * @category Services
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const engine = yield* QuantityEngine
 *   return yield* engine.parse("2 ft 4 in", "Length")
 * })
 * Effect.runPromise(program.pipe(Effect.provide(QuantityEngine.layer())))
 * ```
 */
export class QuantityEngine extends Context.Tag("effect-quantity-algebra/QuantityEngine")<
  QuantityEngine,
  QuantityEngineService
>() {
  static layer(options: QuantityEngineOptions = {}) {
    return Layer.effect(this, makeQuantityEngine(options))
  }
}
