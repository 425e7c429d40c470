/**
 * Error hierarchy for the quantity engine.
 *
 * Every failure mode is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Messages stay human-readable while the fields carry the
 * structured data for programmatic handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { OperatorName, QuantityTypeName } from "./Types.js"

/**
 * Raised when the unit definition table cannot be read or is inconsistent.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitTableError extends Data.TaggedError("UnitTableError")<{
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit definition table: ${this.reason}`
  }
}

/**
 * Raised when a unit name is not declared for a quantity type.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly quantityType: QuantityTypeName
  readonly unit: string
}> {
  override get message(): string {
    return `Unknown ${this.quantityType} unit "${this.unit}"`
  }
}

/**
 * Raised when a culture name has no registered number format.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownCultureError extends Data.TaggedError("UnknownCultureError")<{
  readonly culture: string
}> {
  override get message(): string {
    return `Unknown culture "${this.culture}"`
  }
}

/**
 * Raised when neither the requested culture nor the default culture defines an
 * abbreviation for a unit.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * abbreviationsFor(table, "Length", "Furlong", "en-US").pipe(
 *   Effect.catchTag("AbbreviationNotFoundError", () => Effect.succeed([]))
 * )
 * ```
 */
export class AbbreviationNotFoundError extends Data.TaggedError("AbbreviationNotFoundError")<{
  readonly quantityType: QuantityTypeName
  readonly unit: string
  readonly culture: string
}> {
  override get message(): string {
    return `No abbreviation for ${this.quantityType} unit ${this.unit} in culture ${this.culture}`
  }
}

/**
 * Raised by the pattern builder when a unit has nothing to match against.
 * Callers treat the unit as unparseable.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NoAbbreviationsForUnitError extends Data.TaggedError("NoAbbreviationsForUnitError")<{
  readonly quantityType: QuantityTypeName
  readonly unit: string
  readonly culture: string
}> {
  override get message(): string {
    return `Cannot build a pattern for ${this.quantityType} unit ${this.unit}: no abbreviations in culture ${this.culture}`
  }
}

/**
 * A single pattern tried while parsing. `target` names the unit or composite
 * grammar; `pattern` is absent when no pattern could be built for it.
 *
 * @category Errors
 * @since 0.1.0
 */
export interface ParseAttempt {
  readonly target: string
  readonly pattern: string | undefined
}

/**
 * Recoverable parse failure listing every pattern that was tried.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ParseFailure extends Data.TaggedError("ParseFailure")<{
  readonly text: string
  readonly quantityType: QuantityTypeName
  readonly culture: string
  readonly attempts: ReadonlyArray<ParseAttempt>
}> {
  override get message(): string {
    return `"${this.text}" is not a ${this.quantityType} in culture ${this.culture} (${this.attempts.length} patterns tried)`
  }
}

/**
 * Raised by `parse` when the text does not describe a quantity of the
 * requested type.
 *
 * @category Errors
 * @since 0.1.0
 */
export class QuantityFormatError extends Data.TaggedError("QuantityFormatError")<{
  readonly text: string
  readonly quantityType: QuantityTypeName
  readonly culture: string
  readonly attempts: ReadonlyArray<ParseAttempt>
}> {
  override get message(): string {
    return `Unable to parse "${this.text}" as ${this.quantityType}`
  }
}

/**
 * Raised by the composite entry points when the quantity type registers no
 * composite grammar (or not the one requested).
 *
 * @category Errors
 * @since 0.1.0
 */
export class NoCompositeGrammarError extends Data.TaggedError("NoCompositeGrammarError")<{
  readonly quantityType: QuantityTypeName
  readonly grammar: string | undefined
}> {
  override get message(): string {
    return this.grammar === undefined
      ? `${this.quantityType} has no composite grammar`
      : `${this.quantityType} has no composite grammar named ${this.grammar}`
  }
}

/**
 * Raised when the divisor of a division has a base value of zero.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly dividend: QuantityTypeName
  readonly divisor: QuantityTypeName
}> {
  override get message(): string {
    return `Cannot divide ${this.dividend} by a zero ${this.divisor}`
  }
}

/**
 * Raised by the runtime operator lookups when no rule covers the operands.
 *
 * @category Errors
 * @since 0.1.0
 */
export class OperatorNotDefinedError extends Data.TaggedError("OperatorNotDefinedError")<{
  readonly operator: OperatorName
  readonly left: QuantityTypeName
  readonly right: QuantityTypeName
}> {
  override get message(): string {
    return `No rule to ${this.operator} ${this.left} by ${this.right}`
  }
}

/**
 * Raised when a set of product rules derives contradictory results.
 *
 * @category Errors
 * @since 0.1.0
 */
export class OperatorNetworkError extends Data.TaggedError("OperatorNetworkError")<{
  readonly conflicts: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Inconsistent operator network: ${this.conflicts.join("; ")}`
  }
}

/**
 * Raised when same-type arithmetic receives operands of different types.
 *
 * @category Errors
 * @since 0.1.0
 */
export class QuantityTypeMismatchError extends Data.TaggedError("QuantityTypeMismatchError")<{
  readonly operation: string
  readonly left: QuantityTypeName
  readonly right: QuantityTypeName
}> {
  override get message(): string {
    return `Cannot ${this.operation} ${this.left} and ${this.right}`
  }
}

/**
 * Union of the errors surfaced while parsing text.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityParseError = QuantityFormatError | NoCompositeGrammarError
