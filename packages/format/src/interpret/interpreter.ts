import { Char, type Datum, listToArray } from '../core/datum.ts'
import { MalformedDirectiveError, TypeMismatchError } from '../core/errors.ts'
import type { OutputSink } from '../core/sink.ts'
import { type DirectiveToken, scan, TokenKind } from '../scan/scanner.ts'
import { preview } from '../write/writer.ts'
import { ArgumentCursor } from './cursor.ts'
import { isRadixCode, renderFixed, renderRadix } from './numeric.ts'

/**
 * Value renderers used by the consuming directives.
 */
export interface Renderers {
	/** `~a` */
	display(value: Datum): string
	/** `~s` */
	write(value: Datum): string
	/** `~w` */
	writeShared(value: Datum): string
	/** `~y` */
	prettyPrint(value: Datum): string
}

/**
 * State shared by every frame of one interpretation, including `~?` frames.
 */
export interface InterpretContext {
	readonly sink: OutputSink
	readonly renderers: Renderers
	readonly helpText: string
}

type DirectiveHandler = (
	directive: DirectiveToken,
	cursor: ArgumentCursor,
	context: InterpretContext
) => void

function emit(text: string): DirectiveHandler {
	return (_directive, _cursor, context) => context.sink.write(text)
}

function render(renderWith: (renderers: Renderers, value: Datum) => string): DirectiveHandler {
	return (directive, cursor, context) => {
		context.sink.write(renderWith(context.renderers, cursor.next(directive)))
	}
}

const radix: DirectiveHandler = (directive, cursor, context) => {
	const value = cursor.next(directive)
	const text = isRadixCode(directive.code) ? renderRadix(value, directive.code) : undefined
	if (text === undefined) {
		throw new TypeMismatchError('TFTYPE001', directive.offset, {
			code: directive.code,
			value: preview(value),
		})
	}
	context.sink.write(text)
}

const character: DirectiveHandler = (directive, cursor, context) => {
	const value = cursor.next(directive)
	if (!(value instanceof Char)) {
		throw new TypeMismatchError('TFTYPE002', directive.offset, { value: preview(value) })
	}
	context.sink.write(value.toString())
}

const fixed: DirectiveHandler = (directive, cursor, context) => {
	const value = cursor.next(directive)
	const text = renderFixed(value, directive.params ?? {})
	if (text === undefined) {
		throw new TypeMismatchError('TFTYPE003', directive.offset, { value: preview(value) })
	}
	context.sink.write(text)
}

/** Sub-template arguments: a proper list or a vector. */
function toArgumentList(value: Datum): readonly Datum[] | undefined {
	return Array.isArray(value) ? value : listToArray(value)
}

const indirect: DirectiveHandler = (directive, cursor, context) => {
	const template = cursor.next(directive)
	if (typeof template !== 'string') {
		throw new TypeMismatchError('TFTYPE004', directive.offset, {
			code: directive.code,
			value: preview(template),
		})
	}
	const argsValue = cursor.next(directive)
	const args = toArgumentList(argsValue)
	if (args === undefined) {
		throw new TypeMismatchError('TFTYPE005', directive.offset, {
			code: directive.code,
			value: preview(argsValue),
		})
	}
	interpret(template, args, context)
}

const HANDLERS: Readonly<Record<string, DirectiveHandler>> = {
	'%': emit('\n'),
	'&': (_directive, _cursor, context) => context.sink.freshLine(),
	'?': indirect,
	_: emit(' '),
	'~': emit('~'),
	a: render((r, value) => r.display(value)),
	b: radix,
	c: character,
	d: radix,
	f: fixed,
	h: (_directive, _cursor, context) => context.sink.write(context.helpText),
	k: indirect,
	o: radix,
	s: render((r, value) => r.write(value)),
	t: emit('\t'),
	w: render((r, value) => r.writeShared(value)),
	x: radix,
	y: render((r, value) => r.prettyPrint(value)),
}

/**
 * Runs one template against its arguments, writing into the context's sink.
 * `~?` and `~k` recurse with the same context, so the sink (and its
 * freshline state) spans every frame. Output written before an error stays
 * in the sink.
 *
 * @throws {FormatError} On a malformed directive or an argument mismatch
 */
export function interpret(template: string, args: readonly Datum[], context: InterpretContext): void {
	const cursor = new ArgumentCursor(args)
	for (const token of scan(template)) {
		if (token.kind === TokenKind.Literal) {
			context.sink.write(token.text)
			continue
		}
		const handler = HANDLERS[token.code]
		if (handler === undefined) {
			throw new MalformedDirectiveError('TFSCAN005', token.offset, { code: token.code })
		}
		handler(token, cursor, context)
	}
	cursor.finish(template.length)
}
