/**
 * @since 0.1.0
 */
export * as Abbreviations from "./Abbreviations.js"

/**
 * @since 0.1.0
 */
export * as Culture from "./Culture.js"

/**
 * @since 0.1.0
 */
export * from "./Engine.js"

/**
 * @since 0.1.0
 */
export * from "./Errors.js"

/**
 * @since 0.1.0
 */
export * as FeetInches from "./FeetInches.js"

/**
 * @since 0.1.0
 */
export * as Format from "./Format.js"

/**
 * @since 0.1.0
 */
export * as Operators from "./Operators.js"

/**
 * @since 0.1.0
 */
export * as Parser from "./Parser.js"

/**
 * @since 0.1.0
 */
export * as Patterns from "./Patterns.js"

/**
 * @since 0.1.0
 */
export * as Quantity from "./Quantity.js"

/**
 * @since 0.1.0
 */
export * from "./Types.js"

/**
 * @since 0.1.0
 */
export * as UnitTable from "./UnitTable.js"
