import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'
import { Char, type Datum, NIL, Pair, sym } from '../core/datum.ts'
import { ReadError } from '../core/errors.ts'
import { complex, inexact, type Real, ratio } from '../core/numbers.ts'

/**
 * Datum Grammar Source
 *
 * External representations as `write` produces them, plus the usual reader
 * conveniences: quote abbreviation, `;` comments, `#n=` / `#n#` labels.
 */
const grammarSource = String.raw`
DatumText {
  Data = Datum*
  Datum = Labeled | reference | Vector | List | Quoted | atom

  Labeled = label Datum
  List = "(" Datum+ "." Datum ")"  -- dotted
       | "(" Datum* ")"            -- proper
  Vector = "#(" Datum* ")"
  Quoted = "'" Datum

  label = "#" digit+ "="
  reference = "#" digit+ "#"

  atom = boolean | character | string | number | symbol

  boolean = ("#true" | "#false" | "#t" | "#f") ~symbolChar

  character = "#\\" charBody
  charBody = "x" hexDigit+ ~symbolChar   -- hex
           | letter letter+ ~symbolChar  -- named
           | any                         -- single

  string = "\"" stringChar* "\""
  stringChar = "\\" "x" hexDigit+ ";"  -- hex
             | "\\" any               -- escaped
             | ~"\"" any              -- plain

  number = numberBody
  numberBody = complex ~symbolChar | real ~symbolChar
  complex = real sign ureal "i"                  -- full
          | real sign ("inf.0" | "nan.0") "i"    -- specialFull
          | real sign "i"                        -- unitFull
          | sign ureal "i"                       -- pure
          | sign ("inf.0" | "nan.0") "i"         -- specialPure
          | sign "i"                             -- unit
  real = sign? ureal                 -- signed
       | sign ("inf.0" | "nan.0")    -- special
  ureal = ratio | decimal | integer
  ratio = digit+ "/" digit+
  decimal = digit+ "." digit* exponent?  -- trailing
          | "." digit+ exponent?         -- leading
          | digit+ exponent              -- exp
  exponent = ("e" | "E") sign? digit+
  integer = digit+
  sign = "+" | "-"

  symbol = "|" barChar* "|"                -- bar
         | ~("." ~symbolChar) symbolChar+  -- plain
  barChar = "\\" any  -- escaped
          | ~"|" any  -- plain
  symbolChar = alnum | "!" | "$" | "%" | "&" | "*" | "/" | ":" | "<" | "="
             | ">" | "?" | "^" | "_" | "~" | "+" | "-" | "." | "@"

  space += comment
  comment = ";" (~"\n" any)*
}
`

/**
 * The compiled datum grammar.
 */
export const DatumGrammar = ohm.grammar(grammarSource)

/**
 * Parsed datum before labels are resolved.
 */
export type ReadNode =
	| { readonly kind: 'atom'; readonly value: Datum }
	| { readonly kind: 'list'; readonly items: readonly ReadNode[]; readonly tail: ReadNode | null }
	| { readonly kind: 'vector'; readonly items: readonly ReadNode[] }
	| { readonly kind: 'labeled'; readonly label: number; readonly node: ReadNode }
	| { readonly kind: 'reference'; readonly label: number }

const CHAR_CODES = new Map<string, number>([
	['alarm', 0x07],
	['backspace', 0x08],
	['delete', 0x7f],
	['escape', 0x1b],
	['newline', 0x0a],
	['null', 0x00],
	['return', 0x0d],
	['space', 0x20],
	['tab', 0x09],
])

const STRING_ESCAPES: Readonly<Record<string, string>> = {
	a: '\x07',
	b: '\b',
	n: '\n',
	r: '\r',
	t: '\t',
}

function parseInteger(text: string): bigint {
	return BigInt(text.startsWith('+') ? text.slice(1) : text)
}

function parseReal(text: string): Real {
	if (text === '' || text === '+') return 1
	if (text === '-') return -1
	if (text.endsWith('inf.0')) return text.startsWith('-') ? -Infinity : Infinity
	if (text.endsWith('nan.0')) return Number.NaN
	const slash = text.indexOf('/')
	if (slash !== -1) return ratio(parseInteger(text.slice(0, slash)), parseInteger(text.slice(slash + 1)))
	if (/^[+-]?\d+$/.test(text)) {
		const integer = parseInteger(text)
		const small = Number(integer)
		return Number.isSafeInteger(small) ? small : integer
	}
	return inexact(Number(text))
}

/** Splits `a+bi` at the sign that starts the imaginary part. */
function parseNumber(text: string): Datum {
	if (!text.endsWith('i') || text.endsWith('inf.0')) return parseReal(text)
	const body = text.slice(0, -1)
	let split = 0
	for (let i = body.length - 1; i > 0; i--) {
		const ch = body[i]
		const before = body[i - 1]
		if ((ch === '+' || ch === '-') && before !== 'e' && before !== 'E') {
			split = i
			break
		}
	}
	const real = split === 0 ? 0 : parseReal(body.slice(0, split))
	return complex(real, parseReal(body.slice(split)))
}

function atomNode(value: Datum): ReadNode {
	return { kind: 'atom', value }
}

/**
 * Create semantics for the datum grammar.
 */
export function createSemantics(): Semantics {
	const semantics = DatumGrammar.createSemantics()

	// Lexical atoms to values
	semantics.addOperation<Datum>('toValue', {
		barChar_escaped(_backslash: Node, ch: Node) {
			return ch.sourceString
		},
		barChar_plain(ch: Node) {
			return ch.sourceString
		},
		boolean(_literal: Node) {
			return this.sourceString.startsWith('#t')
		},
		character(_prefix: Node, body: Node) {
			return body['toValue']()
		},
		charBody_hex(_x: Node, digits: Node) {
			return new Char(Number.parseInt(digits.sourceString, 16))
		},
		charBody_named(_first: Node, _rest: Node) {
			const code = CHAR_CODES.get(this.sourceString)
			if (code === undefined) throw new ReadError(`unknown character name "${this.sourceString}"`)
			return new Char(code)
		},
		charBody_single(ch: Node) {
			const codePoint = ch.sourceString.codePointAt(0)
			if (codePoint === undefined) throw new ReadError('empty character literal')
			return new Char(codePoint)
		},
		number(_body: Node) {
			return parseNumber(this.sourceString)
		},
		string(_open: Node, chars: Node, _close: Node) {
			return chars.children.map((c: Node) => c['toValue']()).join('')
		},
		stringChar_escaped(_backslash: Node, ch: Node) {
			return STRING_ESCAPES[ch.sourceString] ?? ch.sourceString
		},
		stringChar_hex(_backslash: Node, _x: Node, digits: Node, _semicolon: Node) {
			return String.fromCodePoint(Number.parseInt(digits.sourceString, 16))
		},
		stringChar_plain(ch: Node) {
			return ch.sourceString
		},
		symbol_bar(_open: Node, chars: Node, _close: Node) {
			return sym(chars.children.map((c: Node) => c['toValue']()).join(''))
		},
		symbol_plain(_chars: Node) {
			return sym(this.sourceString)
		},
	})

	// Structure to ReadNode
	semantics.addOperation<ReadNode>('toNode', {
		atom(value: Node) {
			return atomNode(value['toValue']())
		},
		Labeled(label: Node, datum: Node) {
			return { kind: 'labeled', label: Number(label.sourceString.slice(1, -1)), node: datum['toNode']() }
		},
		List_dotted(_open: Node, heads: Node, _dot: Node, tail: Node, _close: Node) {
			return {
				items: heads.children.map((d: Node) => d['toNode']()),
				kind: 'list',
				tail: tail['toNode'](),
			}
		},
		List_proper(_open: Node, items: Node, _close: Node) {
			return { items: items.children.map((d: Node) => d['toNode']()), kind: 'list', tail: null }
		},
		Quoted(_quote: Node, datum: Node) {
			return { items: [atomNode(sym('quote')), datum['toNode']()], kind: 'list', tail: null }
		},
		reference(_hash: Node, digits: Node, _close: Node) {
			return { kind: 'reference', label: Number(digits.sourceString) }
		},
		Vector(_open: Node, items: Node, _close: Node) {
			return { items: items.children.map((d: Node) => d['toNode']()), kind: 'vector' }
		},
	})

	semantics.addOperation<ReadNode[]>('toNodes', {
		Data(items: Node) {
			return items.children.map((d: Node) => d['toNode']())
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Builds data from read nodes, creating labeled compounds before their
 * contents so `#n#` inside them can point back at them.
 */
class LabelResolver {
	private readonly labels = new Map<number, Datum>()

	build(node: ReadNode): Datum {
		switch (node.kind) {
			case 'atom':
				return node.value
			case 'reference':
				return this.lookup(node.label)
			case 'labeled':
				return this.labeled(node.label, node.node)
			case 'list':
				return this.fillList(this.allocateList(node.items.length), node.items, node.tail)
			case 'vector':
				return this.fillVector(new Array<Datum>(node.items.length), node.items)
		}
	}

	private lookup(label: number): Datum {
		if (!this.labels.has(label)) throw new ReadError(`reference to undefined label #${label}#`)
		return this.labels.get(label)
	}

	private define(label: number, value: Datum): void {
		if (this.labels.has(label)) throw new ReadError(`label #${label}= defined twice`)
		this.labels.set(label, value)
	}

	private labeled(label: number, node: ReadNode): Datum {
		if (node.kind === 'list') {
			const head = this.allocateList(node.items.length)
			this.define(label, head)
			return this.fillList(head, node.items, node.tail)
		}
		if (node.kind === 'vector') {
			const items = new Array<Datum>(node.items.length)
			this.define(label, items)
			return this.fillVector(items, node.items)
		}
		if (node.kind === 'reference' || node.kind === 'labeled') {
			throw new ReadError(`label #${label}= must name a datum`)
		}
		this.define(label, node.value)
		return node.value
	}

	private allocateList(length: number): Pair | typeof NIL {
		let head: Pair | typeof NIL = NIL
		for (let i = 0; i < length; i++) head = new Pair(undefined, head)
		return head
	}

	private fillList(head: Pair | typeof NIL, items: readonly ReadNode[], tail: ReadNode | null): Datum {
		let pair: Datum = head
		let last: Pair | undefined
		for (const item of items) {
			if (!(pair instanceof Pair)) break
			pair.car = this.build(item)
			last = pair
			pair = pair.cdr
		}
		if (last !== undefined && tail !== null) last.cdr = this.build(tail)
		return head
	}

	private fillVector(target: Datum[], items: readonly ReadNode[]): Datum[] {
		items.forEach((item, index) => {
			target[index] = this.build(item)
		})
		return target
	}
}

function matchData(text: string): ReadNode[] {
	const matchResult = DatumGrammar.match(text)
	if (matchResult.failed()) {
		throw new ReadError(matchResult.shortMessage ?? 'syntax error')
	}
	return semantics(matchResult)['toNodes']()
}

/**
 * Reads every datum in the text.
 *
 * @throws {ReadError} On malformed text
 */
export function readAll(text: string): Datum[] {
	const resolver = new LabelResolver()
	return matchData(text).map((node) => resolver.build(node))
}

/**
 * Reads exactly one datum.
 *
 * @throws {ReadError} On malformed text or when the text holds more or fewer than one datum
 */
export function read(text: string): Datum {
	const data = readAll(text)
	if (data.length !== 1) throw new ReadError(`expected one datum, found ${data.length}`)
	return data[0]
}
