/**
 * Quantity parser.
 *
 * Text is trimmed and matched against the anchored pattern of every unit of
 * the requested type, in table declaration order; the first match wins, so a
 * shared abbreviation always resolves to the first-declared unit. When no
 * single unit matches, the type's composite grammars are tried in order and
 * their parts summed in the first part's unit.
 *
 * The sign of a composite belongs to its leading part only: `"-2 ft 4 in"`
 * is `-(2 ft) + 4 in`.
 *
 * @since 0.1.0
 */

import { Array as Arr, Effect, Either, Option } from "effect"
import { unitAbbreviations } from "./Abbreviations.js"
import { parseNumber, type Culture } from "./Culture.js"
import {
  NoCompositeGrammarError,
  ParseFailure,
  QuantityFormatError,
  UnitNotFoundError,
  type ParseAttempt,
  type QuantityParseError,
} from "./Errors.js"
import type { PatternCache } from "./Patterns.js"
import { add, make, type Quantity } from "./Quantity.js"
import type { QuantityTypeName } from "./Types.js"
import { compositesOf, isUnitOf, unitsOf, type CompositeGrammar, type Unit, type UnitTable } from "./UnitTable.js"

/**
 * Everything a parse needs besides its arguments.
 *
 * @since 0.1.0
 * @category Parsing
 */
export interface ParserContext {
  readonly table: UnitTable
  readonly patterns: PatternCache
}

interface Match<Q extends QuantityTypeName> {
  readonly attempt: ParseAttempt
  readonly quantity: Option.Option<Quantity<Q>>
}

interface Outcome<Q extends QuantityTypeName> {
  readonly attempts: ReadonlyArray<ParseAttempt>
  readonly quantity: Option.Option<Quantity<Q>>
}

const matchUnit = <Q extends QuantityTypeName>(
  context: ParserContext,
  unit: Unit<Q>,
  text: string,
  culture: Culture,
): Effect.Effect<Match<Q>> =>
  Effect.gen(function* () {
    const pattern = yield* Effect.either(context.patterns.unitPattern(unit, culture))
    if (Either.isLeft(pattern)) {
      yield* Effect.logDebug(`Skipping unparseable unit: ${pattern.left.message}`)
      return { attempt: { target: unit.name, pattern: undefined }, quantity: Option.none() }
    }
    const quantity = Option.fromNullable(pattern.right.regex.exec(text)).pipe(
      Option.flatMap((match) => Option.fromNullable(match[1])),
      Option.flatMap((number) => parseNumber(number, culture)),
      Option.map((value) => make(value, unit)),
    )
    return { attempt: { target: unit.name, pattern: pattern.right.source }, quantity }
  })

const matchSingleUnit = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
): Effect.Effect<Outcome<Q>> =>
  Effect.gen(function* () {
    const attempts: Array<ParseAttempt> = []
    for (const unit of unitsOf(context.table, quantityType)) {
      const match = yield* matchUnit(context, unit, text, culture)
      attempts.push(match.attempt)
      if (Option.isSome(match.quantity)) {
        return { attempts, quantity: match.quantity }
      }
    }
    return { attempts, quantity: Option.none() }
  })

const matchComposite = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  grammar: CompositeGrammar,
  culture: Culture,
): Effect.Effect<Match<Q>> =>
  Effect.gen(function* () {
    const pattern = yield* Effect.either(context.patterns.compositePattern(quantityType, grammar, culture))
    if (Either.isLeft(pattern)) {
      yield* Effect.logDebug(`Skipping composite grammar: ${pattern.left.message}`)
      return { attempt: { target: grammar.name, pattern: undefined }, quantity: Option.none() }
    }
    const attempt = { target: grammar.name, pattern: pattern.right.source }
    const groups = pattern.right.regex.exec(text)?.groups
    if (groups === undefined) {
      return { attempt, quantity: Option.none() }
    }
    const parts: Array<Quantity<Q>> = []
    for (const part of pattern.right.parts) {
      const groupText = groups[part.group]
      const unit = part.unit
      if (groupText === undefined || !isUnitOf(quantityType)(unit)) {
        return { attempt, quantity: Option.none() }
      }
      const match = yield* matchUnit(context, unit, groupText, culture)
      if (Option.isNone(match.quantity)) {
        return { attempt, quantity: Option.none() }
      }
      parts.push(match.quantity.value)
    }
    if (!Arr.isNonEmptyArray(parts)) {
      return { attempt, quantity: Option.none() }
    }
    const sum = Arr.reduce(Arr.tailNonEmpty(parts), Arr.headNonEmpty(parts), (total, next) => add(total, next))
    return { attempt, quantity: Option.some(sum) }
  })

const matchComposites = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  grammars: ReadonlyArray<CompositeGrammar>,
  culture: Culture,
): Effect.Effect<Outcome<Q>> =>
  Effect.gen(function* () {
    const attempts: Array<ParseAttempt> = []
    for (const grammar of grammars) {
      const match = yield* matchComposite(context, text, quantityType, grammar, culture)
      attempts.push(match.attempt)
      if (Option.isSome(match.quantity)) {
        return { attempts, quantity: match.quantity }
      }
    }
    return { attempts, quantity: Option.none() }
  })

const settle = <Q extends QuantityTypeName>(
  text: string,
  quantityType: Q,
  culture: Culture,
  outcome: Outcome<Q>,
): Effect.Effect<Quantity<Q>, ParseFailure> =>
  Option.match(outcome.quantity, {
    onNone: () =>
      Effect.fail(new ParseFailure({ text, quantityType, culture: culture.name, attempts: outcome.attempts })),
    onSome: Effect.succeed,
  })

/**
 * Parse `text` as a quantity of `quantityType`: single units first, then the
 * type's composite grammars. Fails with a `ParseFailure` listing every pattern
 * tried.
 *
 * @since 0.1.0
 * @category Parsing
 */
export const parseQuantity = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
): Effect.Effect<Quantity<Q>, ParseFailure> =>
  Effect.gen(function* () {
    const trimmed = text.trim()
    if (trimmed.length === 0) {
      return yield* settle(trimmed, quantityType, culture, { attempts: [], quantity: Option.none() })
    }
    const single = yield* matchSingleUnit(context, trimmed, quantityType, culture)
    if (Option.isSome(single.quantity)) {
      return single.quantity.value
    }
    const composite = yield* matchComposites(
      context,
      trimmed,
      quantityType,
      compositesOf(context.table, quantityType),
      culture,
    )
    return yield* settle(trimmed, quantityType, culture, {
      attempts: [...single.attempts, ...composite.attempts],
      quantity: composite.quantity,
    })
  })

const toFormatError = (failure: ParseFailure): QuantityFormatError =>
  new QuantityFormatError({
    text: failure.text,
    quantityType: failure.quantityType,
    culture: failure.culture,
    attempts: failure.attempts,
  })

const logFailure = (failure: ParseFailure) =>
  Effect.logDebug(failure.message).pipe(
    Effect.annotateLogs({ quantityType: failure.quantityType, culture: failure.culture }),
  )

/**
 * @since 0.1.0
 * @category Parsing
 * @example
 * ```ts
 * const length = yield* tryParse(context, "2 ft", "Length", EnglishUnitedStates)
 * // Option.some({ value: 2, unit: Foot, ... })
 * ```
 */
export const tryParse = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
): Effect.Effect<Option.Option<Quantity<Q>>> =>
  parseQuantity(context, text, quantityType, culture).pipe(
    Effect.tapError(logFailure),
    Effect.option,
  )

/**
 * @since 0.1.0
 * @category Parsing
 */
export const parse = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
): Effect.Effect<Quantity<Q>, QuantityFormatError> =>
  parseQuantity(context, text, quantityType, culture).pipe(
    Effect.tapError(logFailure),
    Effect.mapError(toFormatError),
  )

const selectGrammars = (
  table: UnitTable,
  quantityType: QuantityTypeName,
  grammarName: string | undefined,
): Effect.Effect<Arr.NonEmptyReadonlyArray<CompositeGrammar>, NoCompositeGrammarError> => {
  const grammars = compositesOf(table, quantityType).filter(
    (grammar) => grammarName === undefined || grammar.name === grammarName,
  )
  return Arr.isNonEmptyReadonlyArray(grammars)
    ? Effect.succeed(grammars)
    : Effect.fail(new NoCompositeGrammarError({ quantityType, grammar: grammarName }))
}

/**
 * Parse `text` with the composite grammars of `quantityType` only (or the one
 * named `grammarName`).
 *
 * @since 0.1.0
 * @category Parsing
 */
export const parseComposite = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
  grammarName?: string,
): Effect.Effect<Quantity<Q>, QuantityParseError> =>
  Effect.gen(function* () {
    const grammars = yield* selectGrammars(context.table, quantityType, grammarName)
    const trimmed = text.trim()
    const outcome = yield* matchComposites(context, trimmed, quantityType, grammars, culture)
    return yield* settle(trimmed, quantityType, culture, outcome).pipe(
      Effect.tapError(logFailure),
      Effect.mapError(toFormatError),
    )
  })

/**
 * Like `parseComposite`, but every failure, including a missing grammar,
 * yields `None`.
 *
 * @since 0.1.0
 * @category Parsing
 */
export const tryParseComposite = <Q extends QuantityTypeName>(
  context: ParserContext,
  text: string,
  quantityType: Q,
  culture: Culture,
  grammarName?: string,
): Effect.Effect<Option.Option<Quantity<Q>>> =>
  Effect.option(parseComposite(context, text, quantityType, culture, grammarName))

/**
 * Resolve a bare abbreviation such as `"km"` to a unit of `quantityType`.
 * The first-declared unit wins when several share the abbreviation.
 *
 * @since 0.1.0
 * @category Parsing
 */
export const parseUnit = <Q extends QuantityTypeName>(
  table: UnitTable,
  text: string,
  quantityType: Q,
  culture: Culture,
): Effect.Effect<Unit<Q>, UnitNotFoundError> => {
  const abbreviation = text.trim()
  return Effect.findFirst(unitsOf(table, quantityType), (unit) =>
    unitAbbreviations(table, unit, culture.name).pipe(
      Effect.map((abbreviations) => abbreviations.includes(abbreviation)),
      Effect.orElseSucceed(() => false),
    )).pipe(
      Effect.flatMap((found) =>
        Option.match(found, {
          onNone: () => Effect.fail(new UnitNotFoundError({ quantityType, unit: abbreviation })),
          onSome: Effect.succeed,
        })
      ),
    )
}
