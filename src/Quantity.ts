/**
 * Immutable quantity values and same-type arithmetic.
 *
 * A quantity is a value expressed in one unit, tagged with the unit's quantity
 * type. Arithmetic always routes through base values; sums and differences are
 * expressed in the left operand's unit.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { QuantityTypeMismatchError } from "./Errors.js"
import type { QuantityTypeName } from "./Types.js"
import type { Unit } from "./UnitTable.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface Quantity<Q extends QuantityTypeName = QuantityTypeName> {
  readonly quantityType: Q
  readonly value: number
  readonly unit: Unit<Q>
}

const DEFAULT_TOLERANCE = 1e-9

/**
 * Create a quantity of `value` expressed in `unit`. Quantities compare
 * structurally with `Equal.equals`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = <Q extends QuantityTypeName>(value: number, unit: Unit<Q>): Quantity<Q> =>
  Data.struct({ quantityType: unit.quantityType, value, unit })

/**
 * Create a quantity from a base value, expressed in `unit`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromBase = <Q extends QuantityTypeName>(baseValue: number, unit: Unit<Q>): Quantity<Q> =>
  make(unit.fromBase(baseValue), unit)

/**
 * Value of the quantity in its type's base unit.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const baseValue = (quantity: Quantity): number => quantity.unit.toBase(quantity.value)

/**
 * Numeric value of the quantity in another unit of the same type.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const as = <Q extends QuantityTypeName>(quantity: Quantity<Q>, unit: Unit<Q>): number =>
  unit.fromBase(baseValue(quantity))

/**
 * @category Conversions
 * @since 0.1.0
 */
export const convert = <Q extends QuantityTypeName>(quantity: Quantity<Q>, unit: Unit<Q>): Quantity<Q> =>
  fromBase(baseValue(quantity), unit)

const ensureSameType = (operation: string, left: Quantity, right: Quantity): void => {
  if (left.quantityType !== right.quantityType) {
    throw new QuantityTypeMismatchError({ operation, left: left.quantityType, right: right.quantityType })
  }
}

/**
 * Sum of two quantities of the same type, in the left operand's unit.
 *
 * Operands whose runtime types differ are a defect and throw
 * `QuantityTypeMismatchError`.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const add = <Q extends QuantityTypeName>(left: Quantity<Q>, right: Quantity<Q>): Quantity<Q> => {
  ensureSameType("add", left, right)
  return fromBase(baseValue(left) + baseValue(right), left.unit)
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtract = <Q extends QuantityTypeName>(left: Quantity<Q>, right: Quantity<Q>): Quantity<Q> => {
  ensureSameType("subtract", left, right)
  return fromBase(baseValue(left) - baseValue(right), left.unit)
}

/**
 * Negate the value in its own unit.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const negate = <Q extends QuantityTypeName>(quantity: Quantity<Q>): Quantity<Q> =>
  make(-quantity.value, quantity.unit)

/**
 * Multiply the value by a dimensionless factor, keeping the unit.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const scale = <Q extends QuantityTypeName>(quantity: Quantity<Q>, factor: number): Quantity<Q> =>
  make(quantity.value * factor, quantity.unit)

/**
 * Compare two quantities of the same type by base value, within a relative
 * tolerance (absolute below magnitude 1).
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const equals = <Q extends QuantityTypeName>(
  left: Quantity<Q>,
  right: Quantity<Q>,
  tolerance: number = DEFAULT_TOLERANCE,
): boolean => {
  if (left.quantityType !== right.quantityType) {
    return false
  }
  const a = baseValue(left)
  const b = baseValue(right)
  return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b))
}
