import {
	Complex,
	composeComplex,
	integerValue,
	isNegative,
	isNumber,
	numberToString,
	type Real,
	type SchemeNumber,
	toInexact,
} from '../core/numbers.ts'
import type { FixedParams } from '../scan/scanner.ts'

export const Radix = {
	b: 2,
	d: 10,
	o: 8,
	x: 16,
} as const

export type RadixCode = keyof typeof Radix

export function isRadixCode(code: string): code is RadixCode {
	return Object.hasOwn(Radix, code)
}

/**
 * Magnitude from which fixed format switches to exponential notation.
 * Below it, positional digits are exact for every double.
 */
export const EXPONENT_THRESHOLD = 1e21

/** Largest digit count the platform conversions accept. */
const MAX_PLATFORM_DIGITS = 100

/**
 * Integer rendered in a radix without prefix or padding, or undefined when
 * the value is not an integer.
 */
export function renderRadix(value: unknown, code: RadixCode): string | undefined {
	const integer = integerValue(value)
	return integer === undefined ? undefined : integer.toString(Radix[code])
}

function padDigits(text: string, missing: number): string {
	return missing > 0 ? text + '0'.repeat(missing) : text
}

function exponentialText(x: number, digits: number): string {
	const shown = Math.min(digits, MAX_PLATFORM_DIGITS)
	const [mantissa = '', exponent = ''] = x.toExponential(shown).split('e')
	const padded = padDigits(mantissa, digits - shown)
	return `${padded}e${exponent.replace('+', '')}`
}

/**
 * A double with exactly `digits` digits after the decimal point, rounded.
 * Non-finite values keep their `+inf.0` / `+nan.0` spelling.
 */
export function fixedText(x: number, digits: number): string {
	if (Number.isNaN(x)) return '+nan.0'
	if (!Number.isFinite(x)) return x > 0 ? '+inf.0' : '-inf.0'
	if (Math.abs(x) >= EXPONENT_THRESHOLD) return exponentialText(x, digits)
	const shown = Math.min(digits, MAX_PLATFORM_DIGITS)
	const text = padDigits(x.toFixed(shown), digits - shown)
	// toFixed drops the sign of -0
	return Object.is(x, -0) ? `-${text}` : text
}

function fixedReal(value: Real, digits: number): string {
	return fixedText(toInexact(value), digits)
}

/** Number text for `~F`: the natural representation, or `digits` decimals per part. */
export function fixedNumber(value: SchemeNumber, digits: number | undefined): string {
	if (digits === undefined) return numberToString(value)
	if (!(value instanceof Complex)) return fixedReal(value, digits)
	const imag = toInexact(value.imag)
	return composeComplex(
		fixedReal(value.real, digits),
		isNegative(imag),
		fixedText(Math.abs(imag), digits)
	)
}

/**
 * Fixed-format rendering of a string or number, left-padded to the width
 * counted in code points. Never truncates. Returns undefined for any other value.
 */
export function renderFixed(value: unknown, params: FixedParams): string | undefined {
	let text: string
	if (typeof value === 'string') {
		text = value
	} else if (isNumber(value)) {
		text = fixedNumber(value, params.precision)
	} else {
		return undefined
	}
	if (params.width === undefined) return text
	const length = [...text].length
	return length < params.width ? ' '.repeat(params.width - length) + text : text
}
