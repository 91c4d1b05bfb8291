/**
 * Value model for format arguments.
 * Pairs and vectors are the only compound values; everything else is an atom.
 */

import { isNumber, type SchemeNumber } from './numbers.ts'

/** A single Unicode code point. */
export class Char {
	readonly codePoint: number

	constructor(codePoint: number) {
		this.codePoint = codePoint
	}

	toString(): string {
		return String.fromCodePoint(this.codePoint)
	}
}

/** Interned symbol: equal names share one instance. */
export class Sym {
	private static readonly table = new Map<string, Sym>()

	readonly name: string

	private constructor(name: string) {
		this.name = name
	}

	static intern(name: string): Sym {
		const existing = Sym.table.get(name)
		if (existing !== undefined) return existing
		const created = new Sym(name)
		Sym.table.set(name, created)
		return created
	}
}

/** The empty list. */
export class EmptyList {
	static readonly instance = new EmptyList()

	private constructor() {}
}

export const NIL = EmptyList.instance

/** Mutable pair; chains of pairs ending in NIL are proper lists. */
export class Pair {
	car: Datum
	cdr: Datum

	constructor(car: Datum, cdr: Datum) {
		this.car = car
		this.cdr = cdr
	}
}

/**
 * Any value a directive may consume.
 * Arrays are vectors; `undefined` is the unspecified value.
 */
export type Datum =
	| SchemeNumber
	| string
	| boolean
	| Char
	| Sym
	| EmptyList
	| Pair
	| Datum[]
	| undefined

export type Compound = Pair | Datum[]

export function sym(name: string): Sym {
	return Sym.intern(name)
}

export function char(value: string | number): Char {
	if (typeof value === 'number') return new Char(value)
	const codePoint = value.codePointAt(0)
	if (codePoint === undefined || String.fromCodePoint(codePoint) !== value) {
		throw new RangeError(`expected exactly one character, got ${JSON.stringify(value)}`)
	}
	return new Char(codePoint)
}

export function cons(car: Datum, cdr: Datum): Pair {
	return new Pair(car, cdr)
}

export function list(...items: Datum[]): Pair | EmptyList {
	let result: Pair | EmptyList = NIL
	for (let i = items.length - 1; i >= 0; i--) {
		result = new Pair(items[i], result)
	}
	return result
}

export function isCompound(value: Datum): value is Compound {
	return value instanceof Pair || Array.isArray(value)
}

/**
 * Elements of a proper list, or undefined for improper and circular lists.
 */
export function listToArray(value: Datum): Datum[] | undefined {
	const items: Datum[] = []
	let slow: Datum = value
	let fast: Datum = value
	while (fast instanceof Pair) {
		items.push(fast.car)
		fast = fast.cdr
		if (!(fast instanceof Pair)) break
		items.push(fast.car)
		fast = fast.cdr
		slow = slow instanceof Pair ? slow.cdr : slow
		if (fast === slow) return undefined
	}
	return fast === NIL ? items : undefined
}

export function isProperList(value: Datum): boolean {
	return listToArray(value) !== undefined
}

/** Human-readable kind of a value, for diagnostics. */
export function kindOf(value: Datum): string {
	if (value === undefined) return 'unspecified'
	if (typeof value === 'string') return 'string'
	if (typeof value === 'boolean') return 'boolean'
	if (isNumber(value)) return 'number'
	if (value instanceof Char) return 'character'
	if (value instanceof Sym) return 'symbol'
	if (value === NIL) return 'empty list'
	if (value instanceof Pair) return 'pair'
	return 'vector'
}
