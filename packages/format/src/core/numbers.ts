/**
 * Numeric tower for format arguments.
 *
 * - exact integers: `bigint`, or a `number` that is a safe integer
 * - exact rationals: `Ratio`
 * - inexact reals: `Flonum`, or a `number` that is not an integer
 * - complex numbers: `Complex`
 */

/** Exact rational with a normalized denominator greater than one. */
export class Ratio {
	readonly numerator: bigint
	readonly denominator: bigint

	private constructor(numerator: bigint, denominator: bigint) {
		this.numerator = numerator
		this.denominator = denominator
	}

	/** Builds `numerator/denominator` in lowest terms, or the integer it reduces to. */
	static of(numerator: bigint, denominator: bigint): bigint | Ratio {
		if (denominator === 0n) throw new RangeError('ratio with zero denominator')
		const sign = denominator < 0n ? -1n : 1n
		const divisor = gcd(numerator, denominator)
		const num = (sign * numerator) / divisor
		const den = (sign * denominator) / divisor
		return den === 1n ? num : new Ratio(num, den)
	}
}

/** Inexact real, kept boxed so integral values such as 32.0 stay inexact. */
export class Flonum {
	readonly value: number

	constructor(value: number) {
		this.value = value
	}
}

export type Real = number | bigint | Ratio | Flonum

/** Rectangular complex number with a non-zero imaginary part. */
export class Complex {
	readonly real: Real
	readonly imag: Real

	constructor(real: Real, imag: Real) {
		this.real = real
		this.imag = imag
	}
}

export type SchemeNumber = Real | Complex

function gcd(a: bigint, b: bigint): bigint {
	let x = a < 0n ? -a : a
	let y = b < 0n ? -b : b
	while (y !== 0n) {
		const t = x % y
		x = y
		y = t
	}
	return x === 0n ? 1n : x
}

function toBigInt(n: number | bigint): bigint {
	if (typeof n === 'bigint') return n
	if (!Number.isSafeInteger(n)) throw new RangeError(`not an exact integer: ${n}`)
	return BigInt(n)
}

export function ratio(numerator: number | bigint, denominator: number | bigint): bigint | Ratio {
	return Ratio.of(toBigInt(numerator), toBigInt(denominator))
}

export function inexact(value: number): Flonum {
	return new Flonum(value)
}

/** Builds a complex number; an exact zero imaginary part yields the real part itself. */
export function complex(real: Real, imag: Real): SchemeNumber {
	return isExactZero(imag) ? real : new Complex(real, imag)
}

export function isReal(value: unknown): value is Real {
	return (
		typeof value === 'number' ||
		typeof value === 'bigint' ||
		value instanceof Ratio ||
		value instanceof Flonum
	)
}

export function isNumber(value: unknown): value is SchemeNumber {
	return isReal(value) || value instanceof Complex
}

export function isExactInteger(value: unknown): value is number | bigint {
	return typeof value === 'bigint' || (typeof value === 'number' && Number.isSafeInteger(value))
}

export function isExactZero(value: Real): boolean {
	return value === 0n || (typeof value === 'number' && value === 0 && !Object.is(value, -0))
}

export function isInexact(value: SchemeNumber): boolean {
	if (value instanceof Complex) return isInexact(value.real) || isInexact(value.imag)
	return value instanceof Flonum || (typeof value === 'number' && !Number.isSafeInteger(value))
}

/** Converts a real to the nearest double. */
export function toInexact(value: Real): number {
	if (value instanceof Flonum) return value.value
	if (value instanceof Ratio) return ratioToNumber(value)
	return Number(value)
}

function ratioToNumber(value: Ratio): number {
	const num = Number(value.numerator)
	const den = Number(value.denominator)
	if (Number.isFinite(num) && Number.isFinite(den)) return num / den
	// Scale both parts down until they fit in a double.
	const shift = BigInt(Math.max(value.numerator.toString(2).length, value.denominator.toString(2).length) - 1000)
	const scale = 1n << (shift > 0n ? shift : 0n)
	return Number(value.numerator / scale) / Number(value.denominator / scale)
}

/**
 * Integer value of a real, or undefined when it has a fractional part.
 * Inexact integral values such as 32.0 count as integers.
 */
export function integerValue(value: unknown): bigint | undefined {
	if (isExactInteger(value)) return BigInt(value)
	const x = value instanceof Flonum ? value.value : typeof value === 'number' ? value : Number.NaN
	if (Number.isFinite(x) && Number.isInteger(x)) return BigInt(x)
	return undefined
}

export function isNegative(value: Real): boolean {
	if (typeof value === 'bigint') return value < 0n
	if (value instanceof Ratio) return value.numerator < 0n
	const x = toInexact(value)
	return x < 0 || Object.is(x, -0)
}

export function negate(value: Real): Real {
	if (typeof value === 'bigint') return -value
	if (value instanceof Ratio) return Ratio.of(-value.numerator, value.denominator)
	if (value instanceof Flonum) return new Flonum(-value.value)
	return -value
}

/** Textual form of an inexact real: `32.0`, `0.5`, `1e21`, `+inf.0`, `+nan.0`. */
export function flonumToString(x: number, radix = 10): string {
	if (Number.isNaN(x)) return '+nan.0'
	if (!Number.isFinite(x)) return x > 0 ? '+inf.0' : '-inf.0'
	if (Object.is(x, -0)) return '-0.0'
	const text = x.toString(radix)
	if (radix !== 10) return text
	if (/[.e]/.test(text)) return text.replace('e+', 'e')
	return `${text}.0`
}

export function realToString(value: Real, radix = 10): string {
	if (typeof value === 'bigint') return value.toString(radix)
	if (value instanceof Ratio) {
		return `${value.numerator.toString(radix)}/${value.denominator.toString(radix)}`
	}
	if (value instanceof Flonum) return flonumToString(value.value, radix)
	return Number.isSafeInteger(value) ? value.toString(radix) : flonumToString(value, radix)
}

/** Magnitude text of the imaginary part, without the sign that joins it to the real part. */
function unsignedPart(text: string): string {
	return text.startsWith('+') || text.startsWith('-') ? text.slice(1) : text
}

/** Joins separately rendered parts as `<real><sign><|imag|>i`. */
export function composeComplex(realText: string, imagNegative: boolean, imagText: string): string {
	return `${realText}${imagNegative ? '-' : '+'}${unsignedPart(imagText)}i`
}

/** External representation of any number, as `write` prints it. */
export function numberToString(value: SchemeNumber, radix = 10): string {
	if (!(value instanceof Complex)) return realToString(value, radix)

	const negativeImag = isNegative(value.imag)
	const magnitude = negativeImag ? negate(value.imag) : value.imag
	const imagText = magnitude === 1 || magnitude === 1n ? '' : realToString(magnitude, radix)
	const realText = isExactZero(value.real) ? '' : realToString(value.real, radix)
	return composeComplex(realText, negativeImag, imagText)
}
