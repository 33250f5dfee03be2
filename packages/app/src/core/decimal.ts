import * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

// CHANGE: exact decimal text parsing and node-model number formatting
// WHY: both trees must agree on the digits of a number, not on a binary double
// REF: req-decimal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parse(t) = Some(p) → value(p) = value(t) exactly
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unscaled magnitude is non-negative, sign is carried separately
// COMPLEXITY: O(n) where n = digit count

export interface DecimalParts {
  readonly negative: boolean
  readonly unscaled: bigint
  readonly scale: bigint
}

interface MatchedDecimal extends DecimalParts {
  readonly exponent: bigint
}

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/u

const INT32_MIN = -2147483648n
const INT32_MAX = 2147483647n

export const isInt32 = (value: bigint): boolean => value >= INT32_MIN && value <= INT32_MAX

const matchDecimal = (text: string): Option.Option<MatchedDecimal> => {
  const match = DECIMAL_PATTERN.exec(text)
  if (match === null) {
    return Option.none()
  }
  const [, sign = "", integer = "", fraction = "", exponentText] = match
  if (integer.length + fraction.length === 0) {
    return Option.none()
  }
  const exponent = exponentText === undefined ? 0n : BigInt(exponentText)
  return Option.some({
    negative: sign === "-",
    unscaled: BigInt(`${integer}${fraction}`),
    scale: BigInt(fraction.length) - exponent,
    exponent
  })
}

/**
 * Parse decimal text into sign, unscaled magnitude and scale.
 *
 * The exponent may be of any size; `toNodeDecimal` applies the range checks.
 *
 * @pure true
 * @invariant value = (negative ? -1 : 1) * unscaled * 10^(-scale)
 * @complexity O(n)
 */
export const parseDecimalParts = (text: string): Option.Option<DecimalParts> =>
  Option.map(matchDecimal(text), ({ negative, scale, unscaled }) => ({ negative, unscaled, scale }))

/**
 * Materialize parts as an exact BigDecimal when the scale fits in 32 bits.
 *
 * @pure true
 * @complexity O(1)
 */
export const partsToBigDecimal = (parts: DecimalParts): Option.Option<BigDecimal.BigDecimal> =>
  isInt32(parts.scale)
    ? Option.some(BigDecimal.make(parts.negative ? -parts.unscaled : parts.unscaled, Number(parts.scale)))
    : Option.none()

/**
 * Parse text the way the node model's decimal constructor does.
 *
 * Fails when the text is not a decimal, or when either the written exponent
 * or the resulting scale leaves the signed 32-bit range.
 *
 * @pure true
 * @complexity O(n)
 */
export const toNodeDecimal = (text: string): Option.Option<BigDecimal.BigDecimal> =>
  Option.flatMap(
    Option.filter(matchDecimal(text), (matched) => isInt32(matched.exponent)),
    partsToBigDecimal
  )

/**
 * Render an unscaled value and scale in the node model's decimal text.
 *
 * @pure true
 * @invariant plain notation iff scale ≥ 0 and the adjusted exponent ≥ -6
 * @complexity O(n)
 */
export const formatBigDecimal = (unscaled: bigint, scale: number): string => {
  const negative = unscaled < 0n
  const coefficient = (negative ? -unscaled : unscaled).toString()
  const adjusted = -scale + (coefficient.length - 1)
  const sign = negative ? "-" : ""
  if (scale === 0) {
    return `${sign}${coefficient}`
  }
  if (scale > 0 && adjusted >= -6) {
    const padding = scale - coefficient.length
    if (padding >= 0) {
      return `${sign}0.${"0".repeat(padding)}${coefficient}`
    }
    const point = coefficient.length - scale
    return `${sign}${coefficient.slice(0, point)}.${coefficient.slice(point)}`
  }
  const mantissa = coefficient.length > 1
    ? `${coefficient.slice(0, 1)}.${coefficient.slice(1)}`
    : coefficient
  return `${sign}${mantissa}E${adjusted >= 0 ? "+" : ""}${adjusted}`
}

export const formatDecimal = (value: BigDecimal.BigDecimal): string => formatBigDecimal(value.value, value.scale)

/**
 * Render a double in the node model's text: at least one fraction digit, and
 * `E` notation outside [1e-3, 1e7).
 *
 * @pure true
 * @invariant the sign of zero is preserved: -0 → "-0.0"
 * @complexity O(1)
 */
export const formatDouble = (value: number): string => {
  if (Number.isNaN(value)) {
    return "NaN"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "Infinity" : "-Infinity"
  }
  if (value === 0) {
    return Object.is(value, -0) ? "-0.0" : "0.0"
  }
  const magnitude = Math.abs(value)
  if (magnitude >= 1e-3 && magnitude < 1e7) {
    const plain = String(value)
    return plain.includes(".") ? plain : `${plain}.0`
  }
  const [mantissa = "", exponent = "0"] = value.toExponential().split("e")
  const digits = mantissa.includes(".") ? mantissa : `${mantissa}.0`
  return `${digits}E${Number(exponent)}`
}

// shortest decimal that still rounds to the same single-precision value
const shortestFloat = (value: number): number => {
  if (!Number.isFinite(value) || value === 0) {
    return value
  }
  let precision = 1
  while (precision < 10) {
    const candidate = Number(value.toPrecision(precision))
    if (Math.fround(candidate) === value) {
      return candidate
    }
    precision += 1
  }
  return value
}

/**
 * Render a single-precision value with the fewest digits that identify it.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatFloat = (value: number): string => formatDouble(shortestFloat(Math.fround(value)))
