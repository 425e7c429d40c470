/**
 * Dimensional operator network.
 *
 * Cross-type multiplication and division are data: each product rule
 * `A × B = C` also yields `B × A = C`, `C ÷ A = B` and `C ÷ B = A`. The typed
 * `multiply` / `divide` overloads cover exactly the shipped rules, so an
 * undefined combination is a compile error; `multiplyAny` / `divideAny` look
 * the rule up at run time instead.
 *
 * Operands convert to base values, one arithmetic operation is applied and the
 * result is expressed in the result type's base unit. A divisor whose base
 * value is zero fails with `DivisionByZeroError`.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { DivisionByZeroError, OperatorNetworkError, OperatorNotDefinedError } from "./Errors.js"
import { baseValue, fromBase, type Quantity } from "./Quantity.js"
import type { OperatorName, QuantityTypeName } from "./Types.js"
import type { Unit, UnitTable } from "./UnitTable.js"

/**
 * `left × right = result`.
 *
 * @since 0.1.0
 * @category Rules
 */
export interface ProductRule {
  readonly left: QuantityTypeName
  readonly right: QuantityTypeName
  readonly result: QuantityTypeName
}

/**
 * A single multiply or divide rule, shipped or derived.
 *
 * @since 0.1.0
 * @category Rules
 */
export interface OperatorRule extends ProductRule {
  readonly operator: OperatorName
}

/**
 * Product rules shipped with the engine.
 *
 * @since 0.1.0
 * @category Rules
 */
export const productRules: ReadonlyArray<ProductRule> = [
  { left: "Length", right: "Length", result: "Area" },
  { left: "Area", right: "Length", result: "Volume" },
  { left: "Speed", right: "Duration", result: "Length" },
  { left: "Force", right: "Length", result: "Torque" },
  { left: "Mass", right: "Acceleration", result: "Force" },
  { left: "Acceleration", right: "Duration", result: "Speed" },
  { left: "Length", right: "Speed", result: "KinematicViscosity" },
  { left: "Length", right: "SpecificWeight", result: "Pressure" },
]

/**
 * Expand product rules into every multiply and divide rule they imply.
 * Duplicates are kept; `verifyProductRules` folds them.
 *
 * @since 0.1.0
 * @category Rules
 */
export const deriveRules = (products: ReadonlyArray<ProductRule>): ReadonlyArray<OperatorRule> =>
  products.flatMap(({ left, right, result }): ReadonlyArray<OperatorRule> => [
    { operator: "multiply", left, right, result },
    { operator: "multiply", left: right, right: left, result },
    { operator: "divide", left: result, right: left, result: right },
    { operator: "divide", left: result, right, result: left },
  ])

const ruleKey = (operator: OperatorName, left: QuantityTypeName, right: QuantityTypeName): string =>
  `${operator}:${left}:${right}`

/**
 * Derive and index the rules, failing when two derivations give the same
 * operands different result types.
 *
 * @since 0.1.0
 * @category Rules
 * @example
 * ```ts
 * verifyProductRules([
 *   { left: "Length", right: "Length", result: "Area" },
 *   { left: "Length", right: "Length", result: "Volume" },
 * ]) // fails: multiply Length by Length gives both Area and Volume
 * ```
 */
export const verifyProductRules = (
  products: ReadonlyArray<ProductRule>,
): Effect.Effect<ReadonlyMap<string, OperatorRule>, OperatorNetworkError> => {
  const rules = new Map<string, OperatorRule>()
  const conflicts = new Set<string>()
  for (const rule of deriveRules(products)) {
    const key = ruleKey(rule.operator, rule.left, rule.right)
    const existing = rules.get(key)
    if (existing === undefined) {
      rules.set(key, rule)
    } else if (existing.result !== rule.result) {
      conflicts.add(`${rule.operator} ${rule.left} by ${rule.right} gives both ${existing.result} and ${rule.result}`)
    }
  }
  return conflicts.size === 0
    ? Effect.succeed(rules)
    : Effect.fail(new OperatorNetworkError({ conflicts: [...conflicts] }))
}

interface ResolvedRule {
  readonly rule: OperatorRule
  readonly unit: Unit
}

/**
 * Build the network for a unit table. Every result type must be registered in
 * the table.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const makeOperatorNetwork = (
  table: UnitTable,
  products: ReadonlyArray<ProductRule> = productRules,
): Effect.Effect<OperatorNetwork, OperatorNetworkError> =>
  Effect.gen(function* () {
    const rules = yield* verifyProductRules(products)
    const resolved = new Map<string, ResolvedRule>()
    const missing = new Set<QuantityTypeName>()
    for (const [key, rule] of rules) {
      const unit = table.baseUnits.get(rule.result)
      if (unit === undefined) {
        missing.add(rule.result)
      } else {
        resolved.set(key, { rule, unit })
      }
    }
    if (missing.size > 0) {
      return yield* Effect.fail(
        new OperatorNetworkError({
          conflicts: [...missing].map((quantityType) => `${quantityType} is not registered in the unit table`),
        }),
      )
    }
    return new OperatorNetwork(resolved)
  })

/**
 * Cross-type multiply and divide over a verified rule set.
 *
 * @since 0.1.0
 * @category Operators
 */
export class OperatorNetwork {
  constructor(private readonly resolved: ReadonlyMap<string, ResolvedRule>) {}

  /**
   * Every multiply and divide rule, shipped and derived.
   */
  get rules(): ReadonlyArray<OperatorRule> {
    return [...this.resolved.values()].map(({ rule }) => rule)
  }

  /**
   * Result type of `left <operator> right`, if a rule exists.
   */
  resultType(operator: OperatorName, left: QuantityTypeName, right: QuantityTypeName): QuantityTypeName | undefined {
    return this.resolved.get(ruleKey(operator, left, right))?.rule.result
  }

  multiply(left: Quantity<"Length">, right: Quantity<"Length">): Quantity<"Area">
  multiply(left: Quantity<"Area">, right: Quantity<"Length">): Quantity<"Volume">
  multiply(left: Quantity<"Length">, right: Quantity<"Area">): Quantity<"Volume">
  multiply(left: Quantity<"Speed">, right: Quantity<"Duration">): Quantity<"Length">
  multiply(left: Quantity<"Duration">, right: Quantity<"Speed">): Quantity<"Length">
  multiply(left: Quantity<"Force">, right: Quantity<"Length">): Quantity<"Torque">
  multiply(left: Quantity<"Length">, right: Quantity<"Force">): Quantity<"Torque">
  multiply(left: Quantity<"Mass">, right: Quantity<"Acceleration">): Quantity<"Force">
  multiply(left: Quantity<"Acceleration">, right: Quantity<"Mass">): Quantity<"Force">
  multiply(left: Quantity<"Acceleration">, right: Quantity<"Duration">): Quantity<"Speed">
  multiply(left: Quantity<"Duration">, right: Quantity<"Acceleration">): Quantity<"Speed">
  multiply(left: Quantity<"Length">, right: Quantity<"Speed">): Quantity<"KinematicViscosity">
  multiply(left: Quantity<"Speed">, right: Quantity<"Length">): Quantity<"KinematicViscosity">
  multiply(left: Quantity<"Length">, right: Quantity<"SpecificWeight">): Quantity<"Pressure">
  multiply(left: Quantity<"SpecificWeight">, right: Quantity<"Length">): Quantity<"Pressure">
  multiply(left: Quantity, right: Quantity): Quantity {
    // The overloads only admit shipped rules.
    const resolved = this.lookup("multiply", left, right)
    if (resolved === undefined) {
      throw new OperatorNotDefinedError({ operator: "multiply", left: left.quantityType, right: right.quantityType })
    }
    return fromBase(baseValue(left) * baseValue(right), resolved.unit)
  }

  divide(left: Quantity<"Area">, right: Quantity<"Length">): Effect.Effect<Quantity<"Length">, DivisionByZeroError>
  divide(left: Quantity<"Volume">, right: Quantity<"Area">): Effect.Effect<Quantity<"Length">, DivisionByZeroError>
  divide(left: Quantity<"Volume">, right: Quantity<"Length">): Effect.Effect<Quantity<"Area">, DivisionByZeroError>
  divide(left: Quantity<"Length">, right: Quantity<"Speed">): Effect.Effect<Quantity<"Duration">, DivisionByZeroError>
  divide(left: Quantity<"Length">, right: Quantity<"Duration">): Effect.Effect<Quantity<"Speed">, DivisionByZeroError>
  divide(left: Quantity<"Torque">, right: Quantity<"Force">): Effect.Effect<Quantity<"Length">, DivisionByZeroError>
  divide(left: Quantity<"Torque">, right: Quantity<"Length">): Effect.Effect<Quantity<"Force">, DivisionByZeroError>
  divide(
    left: Quantity<"Force">,
    right: Quantity<"Mass">,
  ): Effect.Effect<Quantity<"Acceleration">, DivisionByZeroError>
  divide(
    left: Quantity<"Force">,
    right: Quantity<"Acceleration">,
  ): Effect.Effect<Quantity<"Mass">, DivisionByZeroError>
  divide(
    left: Quantity<"Speed">,
    right: Quantity<"Acceleration">,
  ): Effect.Effect<Quantity<"Duration">, DivisionByZeroError>
  divide(
    left: Quantity<"Speed">,
    right: Quantity<"Duration">,
  ): Effect.Effect<Quantity<"Acceleration">, DivisionByZeroError>
  divide(
    left: Quantity<"KinematicViscosity">,
    right: Quantity<"Length">,
  ): Effect.Effect<Quantity<"Speed">, DivisionByZeroError>
  divide(
    left: Quantity<"KinematicViscosity">,
    right: Quantity<"Speed">,
  ): Effect.Effect<Quantity<"Length">, DivisionByZeroError>
  divide(
    left: Quantity<"Pressure">,
    right: Quantity<"Length">,
  ): Effect.Effect<Quantity<"SpecificWeight">, DivisionByZeroError>
  divide(
    left: Quantity<"Pressure">,
    right: Quantity<"SpecificWeight">,
  ): Effect.Effect<Quantity<"Length">, DivisionByZeroError>
  divide(left: Quantity, right: Quantity): Effect.Effect<Quantity, DivisionByZeroError> {
    const resolved = this.lookup("divide", left, right)
    if (resolved === undefined) {
      return Effect.die(
        new OperatorNotDefinedError({ operator: "divide", left: left.quantityType, right: right.quantityType }),
      )
    }
    return quotient(left, right, resolved.unit)
  }

  /**
   * Multiply two quantities whose types are only known at run time.
   */
  multiplyAny(left: Quantity, right: Quantity): Effect.Effect<Quantity, OperatorNotDefinedError> {
    const resolved = this.lookup("multiply", left, right)
    return resolved === undefined
      ? Effect.fail(
        new OperatorNotDefinedError({ operator: "multiply", left: left.quantityType, right: right.quantityType }),
      )
      : Effect.succeed(fromBase(baseValue(left) * baseValue(right), resolved.unit))
  }

  /**
   * Divide two quantities whose types are only known at run time.
   */
  divideAny(left: Quantity, right: Quantity): Effect.Effect<Quantity, OperatorNotDefinedError | DivisionByZeroError> {
    const resolved = this.lookup("divide", left, right)
    return resolved === undefined
      ? Effect.fail(
        new OperatorNotDefinedError({ operator: "divide", left: left.quantityType, right: right.quantityType }),
      )
      : quotient(left, right, resolved.unit)
  }

  private lookup(operator: OperatorName, left: Quantity, right: Quantity): ResolvedRule | undefined {
    return this.resolved.get(ruleKey(operator, left.quantityType, right.quantityType))
  }
}

const quotient = (left: Quantity, right: Quantity, unit: Unit): Effect.Effect<Quantity, DivisionByZeroError> => {
  const divisor = baseValue(right)
  return divisor === 0
    ? Effect.fail(new DivisionByZeroError({ dividend: left.quantityType, divisor: right.quantityType }))
    : Effect.succeed(fromBase(baseValue(left) / divisor, unit))
}

/**
 * Dimensionless ratio of two quantities of the same type.
 *
 * @since 0.1.0
 * @category Operators
 */
export const ratio = <Q extends QuantityTypeName>(
  left: Quantity<Q>,
  right: Quantity<Q>,
): Effect.Effect<number, DivisionByZeroError> => {
  const divisor = baseValue(right)
  return divisor === 0
    ? Effect.fail(new DivisionByZeroError({ dividend: left.quantityType, divisor: right.quantityType }))
    : Effect.succeed(baseValue(left) / divisor)
}
