/**
 * Type Foundations
 *
 * Quantity type names and culture names shared by every module. Quantity type
 * names form a closed literal union so the operator network can be checked at
 * compile time.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Closed set of physical dimension families known to the engine.
 *
 * @since 0.1.0
 * @category Quantity Types
 */
export const QuantityTypeName = Schema.Literal(
  "Length",
  "Area",
  "Volume",
  "Speed",
  "Acceleration",
  "Force",
  "Torque",
  "Mass",
  "Duration",
  "KinematicViscosity",
  "SpecificWeight",
  "Pressure",
  "Angle",
  "Temperature",
)

/**
 * Type extracted from QuantityTypeName schema
 *
 * @since 0.1.0
 * @category Quantity Types
 */
export type QuantityTypeName = typeof QuantityTypeName.Type

/**
 * Every quantity type name, in declaration order.
 *
 * @since 0.1.0
 * @category Quantity Types
 */
export const quantityTypeNames: ReadonlyArray<QuantityTypeName> = QuantityTypeName.literals

/**
 * Culture identifier such as `"en-US"` or `"ru-RU"`.
 *
 * @since 0.1.0
 * @category Cultures
 */
export const CultureName = Schema.String.pipe(Schema.pattern(/^[a-z]{2,3}(?:-[A-Z]{2})?$/))

/**
 * Type extracted from CultureName schema
 *
 * @since 0.1.0
 * @category Cultures
 */
export type CultureName = typeof CultureName.Type

/**
 * Arithmetic operators covered by the cross-type operator network.
 *
 * @since 0.1.0
 * @category Operators
 */
export const OperatorName = Schema.Literal("multiply", "divide")

/**
 * Type extracted from OperatorName schema
 *
 * @since 0.1.0
 * @category Operators
 */
export type OperatorName = typeof OperatorName.Type
