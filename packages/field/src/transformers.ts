import { ParseError } from './errors'

// ---------------------------------------------------------------------------
// ValueTransformer — raw input string → typed value
// ---------------------------------------------------------------------------

/** Parses raw input. Throws (preferably a `ParseError`) on malformed input. */
export type ValueTransformer<V> = (raw: string) => V

const INTEGER_RE = /^[+-]?\d+$/
const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

function parseInteger(raw: string): number {
  if (!INTEGER_RE.test(raw)) throw new ParseError(raw, `"${raw}" is not an integer`)
  const parsed = Number(raw)
  if (!Number.isSafeInteger(parsed)) {
    throw new ParseError(raw, `"${raw}" is out of the safe integer range`)
  }
  return parsed
}

function parseNumber(raw: string): number {
  const trimmed = raw.trim()
  if (!NUMBER_RE.test(trimmed)) throw new ParseError(raw, `"${raw}" is not a number`)
  return Number(trimmed)
}

// ---------------------------------------------------------------------------
// transformers — standard parsers for string, integer, number and boolean
// ---------------------------------------------------------------------------

export const transformers: {
  string: ValueTransformer<string>
  integer: ValueTransformer<number>
  number: ValueTransformer<number>
  /** Never fails: anything other than a case-insensitive `'true'` is `false`. */
  boolean: ValueTransformer<boolean>
} = {
  string: (raw) => raw,
  integer: parseInteger,
  number: parseNumber,
  boolean: (raw) => raw.toLowerCase() === 'true',
}
