/**
 * Culture-specific number formats.
 *
 * A `Culture` is an explicit value passed into every parse and format call: its
 * name selects the abbreviation set of the unit table, its separators and signs
 * drive the number pattern. Nothing here reads ambient locale state.
 *
 * @since 0.1.0
 */

import { Effect, Option, Schema } from "effect"
import { UnknownCultureError } from "./Errors.js"
import { compile, escapeRegExp } from "./internal/regex.js"
import { CultureName } from "./Types.js"

/**
 * Number format and abbreviation selector for one culture.
 *
 * Construction fails when the decimal and group separators coincide, since the
 * two could not be told apart while parsing.
 *
 * @since 0.1.0
 * @category Cultures
 * @example
 * ```ts
 * const swiss = new Culture({ name: "de-CH", decimalSeparator: ".", groupSeparator: "’", negativeSign: "-" })
 * ```
 */
export class Culture extends Schema.Class<Culture>("Culture")(
  Schema.Struct({
    name: CultureName,
    decimalSeparator: Schema.NonEmptyString,
    groupSeparator: Schema.optional(Schema.NonEmptyString),
    negativeSign: Schema.NonEmptyString,
    positiveSign: Schema.optionalWith(Schema.NonEmptyString, { default: () => "+" }),
  }).pipe(
    Schema.filter((culture) =>
      culture.groupSeparator === culture.decimalSeparator
        ? `Culture ${culture.name} uses "${culture.decimalSeparator}" as both decimal and group separator`
        : undefined,
    ),
  ),
) {}

/**
 * @since 0.1.0
 * @category Cultures
 */
export const EnglishUnitedStates = new Culture({
  name: "en-US",
  decimalSeparator: ".",
  groupSeparator: ",",
  negativeSign: "-",
})

/**
 * @since 0.1.0
 * @category Cultures
 */
export const GermanGermany = new Culture({
  name: "de-DE",
  decimalSeparator: ",",
  groupSeparator: ".",
  negativeSign: "-",
})

/**
 * Groups digits with a no-break space.
 *
 * @since 0.1.0
 * @category Cultures
 */
export const RussianRussia = new Culture({
  name: "ru-RU",
  decimalSeparator: ",",
  groupSeparator: "\u00a0",
  negativeSign: "-",
})

/**
 * Norwegian Bokmål writes negative numbers with U+2212 MINUS SIGN and groups
 * digits with a no-break space.
 *
 * @since 0.1.0
 * @category Cultures
 */
export const NorwegianBokmal = new Culture({
  name: "nb-NO",
  decimalSeparator: ",",
  groupSeparator: "\u00a0",
  negativeSign: "\u2212",
})

/**
 * Cultures shipped with the engine, keyed by name.
 *
 * @since 0.1.0
 * @category Cultures
 */
export const builtinCultures: ReadonlyMap<string, Culture> = new Map(
  [EnglishUnitedStates, GermanGermany, RussianRussia, NorwegianBokmal].map(
    (culture) => [culture.name, culture] as const,
  ),
)

/**
 * Look up a culture by name among the given cultures (the built-ins by default).
 *
 * @since 0.1.0
 * @category Cultures
 */
export const findCulture = (
  name: string,
  cultures: ReadonlyMap<string, Culture> = builtinCultures,
): Effect.Effect<Culture, UnknownCultureError> => {
  const culture = cultures.get(name)
  return culture ? Effect.succeed(culture) : Effect.fail(new UnknownCultureError({ culture: name }))
}

/**
 * Regular-expression source matching a number written in the culture: optional
 * sign, digits with optional grouping, optional fraction, optional exponent.
 * The source contains no capture groups.
 *
 * @since 0.1.0
 * @category Numbers
 */
export const numberPattern = (culture: Culture): string => {
  const sign = `(?:${escapeRegExp(culture.negativeSign)}|${escapeRegExp(culture.positiveSign)})?`
  const integer = culture.groupSeparator === undefined
    ? "\\d+"
    : `(?:\\d{1,3}(?:${escapeRegExp(culture.groupSeparator)}\\d{3})+|\\d+)`
  const decimal = escapeRegExp(culture.decimalSeparator)
  return `${sign}(?:${integer}(?:${decimal}\\d+)?|${decimal}\\d+)(?:[eE][-+]?\\d+)?`
}

const anchoredNumberPatterns = new WeakMap<Culture, RegExp>()

const anchoredNumberPattern = (culture: Culture): RegExp => {
  const cached = anchoredNumberPatterns.get(culture)
  if (cached) {
    return cached
  }
  const compiled = compile(`^${numberPattern(culture)}$`)
  anchoredNumberPatterns.set(culture, compiled)
  return compiled
}

/**
 * Parse a number written in the culture's format. Returns `None` for text that
 * is not a complete number or that overflows to a non-finite value.
 *
 * @since 0.1.0
 * @category Numbers
 * @example
 * ```ts
 * parseNumber("1.234,5", GermanGermany) // Option.some(1234.5)
 * ```
 */
export const parseNumber = (text: string, culture: Culture): Option.Option<number> => {
  if (!anchoredNumberPattern(culture).test(text)) {
    return Option.none()
  }
  let digits = text
  let negative = false
  if (digits.startsWith(culture.negativeSign)) {
    negative = true
    digits = digits.slice(culture.negativeSign.length)
  } else if (digits.startsWith(culture.positiveSign)) {
    digits = digits.slice(culture.positiveSign.length)
  }
  if (culture.groupSeparator !== undefined) {
    digits = digits.split(culture.groupSeparator).join("")
  }
  const value = Number(digits.replace(culture.decimalSeparator, "."))
  if (!Number.isFinite(value)) {
    return Option.none()
  }
  return Option.some(negative ? -value : value)
}

/**
 * Format a number with the culture's decimal separator and negative sign,
 * using the shortest representation that parses back to the same value.
 * No grouping is applied.
 *
 * @since 0.1.0
 * @category Numbers
 */
export const formatNumber = (value: number, culture: Culture): string => {
  const [mantissa = "", exponent] = String(Math.abs(value)).split("e")
  const localized = mantissa.replace(".", culture.decimalSeparator) + (exponent === undefined ? "" : `e${exponent}`)
  return value < 0 ? `${culture.negativeSign}${localized}` : localized
}
