import { Char, type Compound, type Datum, NIL, Pair, Sym } from '../core/datum.ts'
import { isNumber, numberToString } from '../core/numbers.ts'
import { findCycleLabels, findSharedLabels, type LabelTable } from './labels.ts'

const CHAR_NAMES = new Map<number, string>([
	[0x00, 'null'],
	[0x07, 'alarm'],
	[0x08, 'backspace'],
	[0x09, 'tab'],
	[0x0a, 'newline'],
	[0x0d, 'return'],
	[0x1b, 'escape'],
	[0x20, 'space'],
	[0x7f, 'delete'],
])

const STRING_ESCAPES: Readonly<Record<string, string>> = {
	'\t': '\\t',
	'\n': '\\n',
	'\r': '\\r',
	'"': '\\"',
	'\\': '\\\\',
}

/** Names that read back as a symbol without bars. */
const PLAIN_SYMBOL = /^[^\s()"';`,|#\[\]{}][^\s()"';`|\[\]{}]*$/
/** Names a reader would take for a number instead. */
const NUMERIC_LOOKING = /^([+-]?(\d|\.\d)|[+-]((inf|nan)\.0|i$))/

function isControl(codePoint: number): boolean {
	return codePoint < 0x20 || codePoint === 0x7f
}

function hexEscape(codePoint: number): string {
	return `\\x${codePoint.toString(16)};`
}

export function writeString(text: string): string {
	let body = ''
	for (const ch of text) {
		const escape = STRING_ESCAPES[ch]
		const codePoint = ch.codePointAt(0) ?? 0
		body += escape ?? (isControl(codePoint) ? hexEscape(codePoint) : ch)
	}
	return `"${body}"`
}

export function writeChar(value: Char): string {
	const name = CHAR_NAMES.get(value.codePoint)
	if (name !== undefined) return `#\\${name}`
	if (isControl(value.codePoint)) return `#\\x${value.codePoint.toString(16)}`
	return `#\\${value.toString()}`
}

export function writeSymbol(value: Sym): string {
	const { name } = value
	if (name !== '.' && PLAIN_SYMBOL.test(name) && !NUMERIC_LOOKING.test(name)) return name
	return `|${name.replace(/[|\\]/g, '\\$&')}|`
}

/** Any non-compound value; strings, characters and symbols are raw when displaying. */
export function writeAtom(value: Datum, display: boolean): string {
	if (value === undefined) return '#<unspecified>'
	if (typeof value === 'string') return display ? value : writeString(value)
	if (typeof value === 'boolean') return value ? '#t' : '#f'
	if (isNumber(value)) return numberToString(value)
	if (value instanceof Char) return display ? value.toString() : writeChar(value)
	if (value instanceof Sym) return display ? value.name : writeSymbol(value)
	if (value === NIL) return '()'
	throw new TypeError('writeAtom: compound value')
}

/** Pending emission work: a datum still to write, or text to copy out. */
type Emit = { readonly text: string } | { readonly value: Datum }

/**
 * Emission pass of label-aware writing.
 * A labeled node is written as `#n=<datum>` the first time and `#n#` after,
 * so nothing is expanded twice. Works from an explicit stack, like the
 * discovery pass, so nesting depth is not bounded by the call stack.
 */
export class DatumEmitter {
	private readonly labels: LabelTable
	private readonly display: boolean
	private readonly emitted: Set<Compound>
	private readonly parts: string[] = []

	constructor(labels: LabelTable, display: boolean, emitted: Set<Compound> = new Set()) {
		this.labels = labels
		this.display = display
		this.emitted = emitted
	}

	render(value: Datum): string {
		const stack: Emit[] = [{ value }]
		while (stack.length > 0) {
			const work = stack.pop()
			if (work === undefined) break
			if ('text' in work) {
				this.parts.push(work.text)
				continue
			}
			const expanded = this.expand(work.value)
			for (let i = expanded.length - 1; i >= 0; i--) {
				const next = expanded[i]
				if (next !== undefined) stack.push(next)
			}
		}
		return this.parts.join('')
	}

	/** Writes what can be written now and returns the rest in order. */
	private expand(value: Datum): Emit[] {
		if (value instanceof Pair) {
			return this.labelPrefix(value) ? this.pair(value) : []
		}
		if (Array.isArray(value)) {
			return this.labelPrefix(value) ? this.vector(value) : []
		}
		this.parts.push(writeAtom(value, this.display))
		return []
	}

	/** Writes the label of a node; false when only the back-reference was due. */
	private labelPrefix(node: Compound): boolean {
		const label = this.labels.get(node)
		if (label === undefined) return true
		if (this.emitted.has(node)) {
			this.parts.push(`#${label}#`)
			return false
		}
		this.emitted.add(node)
		this.parts.push(`#${label}=`)
		return true
	}

	private pair(head: Pair): Emit[] {
		this.parts.push('(')
		const work: Emit[] = [{ value: head.car }]
		let rest = head.cdr
		while (rest instanceof Pair && !this.labels.has(rest)) {
			work.push({ text: ' ' }, { value: rest.car })
			rest = rest.cdr
		}
		if (rest !== NIL) work.push({ text: ' . ' }, { value: rest })
		work.push({ text: ')' })
		return work
	}

	private vector(items: Datum[]): Emit[] {
		this.parts.push('#(')
		const work: Emit[] = []
		items.forEach((item, index) => {
			if (index > 0) work.push({ text: ' ' })
			work.push({ value: item })
		})
		work.push({ text: ')' })
		return work
	}
}

/** Human-readable rendering (`~a`). Cycles are labeled. */
export function display(value: Datum): string {
	return new DatumEmitter(findCycleLabels(value), true).render(value)
}

/** Machine-readable rendering (`~s`). Cycles are labeled, plain sharing is not. */
export function write(value: Datum): string {
	return new DatumEmitter(findCycleLabels(value), false).render(value)
}

/** Machine-readable rendering with every shared node labeled (`~w`). */
export function writeShared(value: Datum): string {
	return new DatumEmitter(findSharedLabels(value), false).render(value)
}

/** Short written form of a value for diagnostics. */
export function preview(value: Datum, maxLength = 40): string {
	const text = write(value)
	return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text
}
