import { MalformedDirectiveError } from '../core/errors.ts'

export const DIRECTIVE_MARKER = '~'

/** Directive code of the only directive that takes parameters. */
export const FIXED_FORMAT_CODE = 'f'

/** Largest width or precision a fixed-format directive may ask for. */
export const MAX_FIXED_PARAM = 10_000

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Directive: 1,
	Literal: 0,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Width and precision of a `~w,dF` directive; either may be omitted. */
export interface FixedParams {
	readonly width?: number
	readonly precision?: number
}

export interface LiteralToken {
	readonly kind: typeof TokenKind.Literal
	readonly text: string
	/** Offset of the first character in the template */
	readonly offset: number
}

export interface DirectiveToken {
	readonly kind: typeof TokenKind.Directive
	/** Lower-cased directive code */
	readonly code: string
	/** Only set on fixed-format directives written with a parameter prefix */
	readonly params?: FixedParams
	/** Offset of the marker in the template */
	readonly offset: number
}

export type Token = LiteralToken | DirectiveToken

function isParamChar(ch: string | undefined): boolean {
	return ch === ',' || (ch !== undefined && ch >= '0' && ch <= '9')
}

function parseCount(text: string, params: string, offset: number): number | undefined {
	if (text === '') return undefined
	const value = Number(text)
	if (!Number.isSafeInteger(value) || value > MAX_FIXED_PARAM) {
		throw new MalformedDirectiveError('TFSCAN004', offset, { params })
	}
	return value
}

function parseFixedParams(params: string, offset: number): FixedParams {
	const fields = params.split(',')
	if (fields.length > 2) {
		throw new MalformedDirectiveError('TFSCAN004', offset, { params })
	}
	const width = parseCount(fields[0] ?? '', params, offset)
	const precision = parseCount(fields[1] ?? '', params, offset)
	return {
		...(width !== undefined ? { width } : {}),
		...(precision !== undefined ? { precision } : {}),
	}
}

/**
 * Reads the directive whose marker sits at `offset`.
 * Returns the token and the offset just past it.
 */
function readDirective(template: string, offset: number): [DirectiveToken, number] {
	const first = template[offset + 1]
	if (first === undefined) {
		throw new MalformedDirectiveError('TFSCAN001', offset)
	}
	if (!isParamChar(first)) {
		return [{ code: first.toLowerCase(), kind: TokenKind.Directive, offset }, offset + 2]
	}

	let end = offset + 1
	while (isParamChar(template[end])) end++
	const params = template.slice(offset + 1, end)
	const terminator = template[end]
	if (terminator === undefined) {
		throw new MalformedDirectiveError('TFSCAN002', offset, { params })
	}
	const code = terminator.toLowerCase()
	if (code !== FIXED_FORMAT_CODE) {
		throw new MalformedDirectiveError('TFSCAN003', offset, { code: terminator, params })
	}
	return [
		{ code, kind: TokenKind.Directive, offset, params: parseFixedParams(params, offset) },
		end + 1,
	]
}

/**
 * Lazily splits a template into literal spans and directives.
 * Forward-only: a malformed directive throws when the scan reaches it, after
 * every token before it has been yielded.
 */
export function* scan(template: string, start = 0): Generator<Token, void, undefined> {
	let position = start
	while (position < template.length) {
		const marker = template.indexOf(DIRECTIVE_MARKER, position)
		if (marker === -1) {
			yield { kind: TokenKind.Literal, offset: position, text: template.slice(position) }
			return
		}
		if (marker > position) {
			yield { kind: TokenKind.Literal, offset: position, text: template.slice(position, marker) }
		}
		const [token, next] = readDirective(template, marker)
		yield token
		position = next
	}
}

/** Materializes every token of a template. */
export function tokenize(template: string): Token[] {
	return Array.from(scan(template))
}
