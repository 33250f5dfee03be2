import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import {
  formatBigDecimal,
  formatDouble,
  formatFloat,
  isInt32,
  parseDecimalParts,
  toNodeDecimal
} from "../../src/core/decimal.js"

describe("formatBigDecimal", () => {
  it.effect("uses plain notation for non-negative scales close to the point", () =>
    Effect.sync(() => {
      expect(formatBigDecimal(12345n, 0)).toBe("12345")
      expect(formatBigDecimal(-12345n, 2)).toBe("-123.45")
      expect(formatBigDecimal(123n, 5)).toBe("0.00123")
      expect(formatBigDecimal(150n, 2)).toBe("1.50")
    }))

  it.effect("switches to scientific notation for negative scales and small magnitudes", () =>
    Effect.sync(() => {
      expect(formatBigDecimal(1n, -3)).toBe("1E+3")
      expect(formatBigDecimal(10n, -9)).toBe("1.0E+10")
      expect(formatBigDecimal(123n, 10)).toBe("1.23E-8")
      expect(formatBigDecimal(0n, 10)).toBe("0E-10")
    }))
})

describe("formatDouble", () => {
  it.effect("keeps the sign of zero", () =>
    Effect.sync(() => {
      expect(formatDouble(-0)).toBe("-0.0")
      expect(formatDouble(0)).toBe("0.0")
    }))

  it.effect("appends .0 to integral values in the plain range", () =>
    Effect.sync(() => {
      expect(formatDouble(100)).toBe("100.0")
      expect(formatDouble(1.5)).toBe("1.5")
      expect(formatDouble(0.001)).toBe("0.001")
    }))

  it.effect("uses E notation outside [1e-3, 1e7)", () =>
    Effect.sync(() => {
      expect(formatDouble(1e10)).toBe("1.0E10")
      expect(formatDouble(1.5e-7)).toBe("1.5E-7")
      expect(formatDouble(-2.5e20)).toBe("-2.5E20")
    }))

  it.effect("names the non-finite values", () =>
    Effect.sync(() => {
      expect(formatDouble(Number.NaN)).toBe("NaN")
      expect(formatDouble(Number.POSITIVE_INFINITY)).toBe("Infinity")
      expect(formatDouble(Number.NEGATIVE_INFINITY)).toBe("-Infinity")
    }))
})

describe("formatFloat", () => {
  it.effect("prints the shortest text that identifies the single-precision value", () =>
    Effect.sync(() => {
      expect(formatFloat(0.1)).toBe("0.1")
      expect(formatFloat(1e10)).toBe("1.0E10")
      expect(formatFloat(2)).toBe("2.0")
    }))
})

describe("parseDecimalParts", () => {
  it.effect("splits sign, unscaled digits and scale", () =>
    Effect.sync(() => {
      expect(Option.getOrUndefined(parseDecimalParts("12.50e-3"))).toEqual({ negative: false, unscaled: 1250n, scale: 5n })
      expect(Option.getOrUndefined(parseDecimalParts("-7"))).toEqual({ negative: true, unscaled: 7n, scale: 0n })
      expect(Option.getOrUndefined(parseDecimalParts("1."))).toEqual({ negative: false, unscaled: 1n, scale: 0n })
    }))

  it.effect("rejects text without digits", () =>
    Effect.sync(() => {
      expect(Option.isNone(parseDecimalParts("abc"))).toBe(true)
      expect(Option.isNone(parseDecimalParts("."))).toBe(true)
      expect(Option.isNone(parseDecimalParts("NaN"))).toBe(true)
    }))
})

describe("toNodeDecimal", () => {
  it.effect("materializes decimals whose exponent and scale fit in 32 bits", () =>
    Effect.sync(() => {
      const decimal = toNodeDecimal("1e2147483647")
      expect(Option.isSome(decimal)).toBe(true)
      if (Option.isSome(decimal)) {
        expect(decimal.value.value).toBe(1n)
        expect(decimal.value.scale).toBe(-2147483647)
      }
    }))

  it.effect("fails when the written exponent overflows", () =>
    Effect.sync(() => {
      expect(Option.isNone(toNodeDecimal("1e2147483648"))).toBe(true)
    }))

  it.effect("fails when the resulting scale overflows", () =>
    Effect.sync(() => {
      expect(Option.isNone(toNodeDecimal("0.1e-2147483648"))).toBe(true)
    }))

  it.effect("checks the signed 32-bit range", () =>
    Effect.sync(() => {
      expect(isInt32(2147483647n)).toBe(true)
      expect(isInt32(-2147483648n)).toBe(true)
      expect(isInt32(2147483648n)).toBe(false)
    }))
})
