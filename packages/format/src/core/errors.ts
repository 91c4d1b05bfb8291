import {
	type DiagnosticArgs,
	type DiagnosticDef,
	FORMAT_DIAGNOSTICS,
	type FormatDiagnosticCode,
	interpolateMessage,
} from '@tildefmt/diagnostics'

export type FormatErrorKind =
	| 'MalformedDirective'
	| 'ArgumentUnderflow'
	| 'ArgumentOverflow'
	| 'TypeMismatch'

type CodesWithPrefix<P extends string> = Extract<FormatDiagnosticCode, `${P}${string}`>

/**
 * Base class of every error raised while interpreting a template.
 * The message reads `[CODE] offset N: detail`.
 */
export class FormatError extends Error {
	readonly kind: FormatErrorKind
	readonly def: DiagnosticDef
	/** Template offset of the directive that failed */
	readonly offset: number
	/** Interpolated catalog message without code and offset */
	readonly detail: string
	readonly args: DiagnosticArgs | undefined

	constructor(
		kind: FormatErrorKind,
		code: FormatDiagnosticCode,
		offset: number,
		args?: DiagnosticArgs
	) {
		const def = FORMAT_DIAGNOSTICS[code]
		const detail = interpolateMessage(def.message, args)
		super(`[${code}] offset ${offset}: ${detail}`)
		this.name = 'FormatError'
		this.kind = kind
		this.def = def
		this.offset = offset
		this.detail = detail
		this.args = args
	}

	get code(): string {
		return this.def.code
	}
}

export class MalformedDirectiveError extends FormatError {
	constructor(code: CodesWithPrefix<'TFSCAN'>, offset: number, args?: DiagnosticArgs) {
		super('MalformedDirective', code, offset, args)
		this.name = 'MalformedDirectiveError'
	}
}

export class ArgumentUnderflowError extends FormatError {
	constructor(offset: number, args: { code: string; consumed: number }) {
		super('ArgumentUnderflow', 'TFARG001', offset, args)
		this.name = 'ArgumentUnderflowError'
	}
}

export class ArgumentOverflowError extends FormatError {
	constructor(offset: number, args: { remaining: number; total: number }) {
		super('ArgumentOverflow', 'TFARG002', offset, args)
		this.name = 'ArgumentOverflowError'
	}
}

export class TypeMismatchError extends FormatError {
	constructor(code: CodesWithPrefix<'TFTYPE'>, offset: number, args?: DiagnosticArgs) {
		super('TypeMismatch', code, offset, args)
		this.name = 'TypeMismatchError'
	}
}

/**
 * Raised by the datum reader for text that is not a valid external representation.
 */
export class ReadError extends Error {
	readonly code = 'TFREAD001'
	readonly detail: string

	constructor(detail: string) {
		super(`[TFREAD001] ${interpolateMessage(FORMAT_DIAGNOSTICS.TFREAD001.message, { detail })}`)
		this.name = 'ReadError'
		this.detail = detail
	}
}
