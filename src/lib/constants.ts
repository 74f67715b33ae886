/**
 * Shared Constants
 *
 * Formula syntax tokens used by the parser and the feature expander.
 */

/** Separates the response from the feature expression: `y ~ x` */
export const FORMULA_SEPARATOR = '~'

/** Joins feature terms: `x + z` */
export const TERM_SEPARATOR = '+'

/** Interaction operator: `x:z` adds the elementwise product only */
export const INTERACTION_OPERATOR = ':'

/**
 * Cross operator: `x*z` adds both main effects and their product.
 * Checked after INTERACTION_OPERATOR, so `a:b*c` is an interaction.
 */
export const CROSS_OPERATOR = '*'

/** Term that adds a column of ones */
export const INTERCEPT_TERM = '1'

/** Prefix for console output from the formula engine */
export const LOG_PREFIX = '[Formula]'
