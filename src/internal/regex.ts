const SYNTAX_CHARACTERS = /[.*+?^${}()|[\]\\]/g

export const escapeRegExp = (literal: string): string => literal.replace(SYNTAX_CHARACTERS, "\\$&")

// Patterns are compiled in unicode mode so symbols such as ° and ″ match as single code points.
export const compile = (source: string): RegExp => new RegExp(source, "u")

export const alternation = (literals: ReadonlyArray<string>): string =>
  literals.map(escapeRegExp).join("|")
