import type { Datum } from './core/datum.ts'
import { type OutputPort, OutputSink } from './core/sink.ts'
import { helpText } from './interpret/directives.ts'
import { type InterpretContext, interpret, type Renderers } from './interpret/interpreter.ts'
import { DEFAULT_PRETTY_WIDTH, prettyPrint } from './write/pretty.ts'
import { display, write, writeShared } from './write/writer.ts'

/**
 * Where a format call sends its output:
 * - `false`: return the text
 * - `true`: the formatter's default output port
 * - a port: forward to it
 * - an `OutputSink`: write into it, keeping its freshline state
 */
export type Destination = boolean | OutputPort | OutputSink

/**
 * Options for createFormatter.
 */
export interface FormatterOptions {
	/** Port used for destination `true` (default: process.stdout) */
	defaultOutput?: OutputPort
	/** Renderer for `~a` */
	display?: (value: Datum) => string
	/** Renderer for `~s` */
	write?: (value: Datum) => string
	/** Renderer for `~w` */
	writeShared?: (value: Datum) => string
	/** Renderer for `~y` */
	prettyPrint?: (value: Datum, width: number) => string
	/** Line width for `~y` */
	prettyWidth?: number
}

export interface Formatter {
	(template: string, ...args: Datum[]): string
	(destination: false, template: string, ...args: Datum[]): string
	(destination: true | OutputPort | OutputSink, template: string, ...args: Datum[]): undefined
}

function createRenderers(options: FormatterOptions): Renderers {
	const width = options.prettyWidth ?? DEFAULT_PRETTY_WIDTH
	const pretty = options.prettyPrint ?? prettyPrint
	return {
		display: options.display ?? display,
		prettyPrint: (value) => pretty(value, width),
		write: options.write ?? write,
		writeShared: options.writeShared ?? writeShared,
	}
}

/**
 * Build a format function bound to the given options.
 *
 * Ports keep one sink each for the lifetime of the formatter, so a `~&` at
 * the start of one call sees where the previous call to the same port ended.
 */
export function createFormatter(options: FormatterOptions = {}): Formatter {
	const renderers = createRenderers(options)
	const help = helpText()
	const portSinks = new WeakMap<OutputPort, OutputSink>()

	function sinkFor(port: OutputPort): OutputSink {
		const existing = portSinks.get(port)
		if (existing !== undefined) return existing
		const sink = new OutputSink(port)
		portSinks.set(port, sink)
		return sink
	}

	function run(sink: OutputSink, template: string, args: readonly Datum[]): void {
		const context: InterpretContext = { helpText: help, renderers, sink }
		interpret(template, args, context)
	}

	function toText(template: string, args: readonly Datum[]): string {
		const sink = new OutputSink()
		run(sink, template, args)
		return sink.text()
	}

	function format(template: string, ...args: Datum[]): string
	function format(destination: false, template: string, ...args: Datum[]): string
	function format(
		destination: true | OutputPort | OutputSink,
		template: string,
		...args: Datum[]
	): undefined
	function format(first: Destination | string, ...rest: Datum[]): string | undefined {
		if (typeof first === 'string') return toText(first, rest)

		const [template, ...args] = rest
		if (typeof template !== 'string') {
			throw new TypeError('format: expected a template string after the destination')
		}
		if (first === false) return toText(template, args)

		const port = first === true ? (options.defaultOutput ?? process.stdout) : first
		run(port instanceof OutputSink ? port : sinkFor(port), template, args)
		return undefined
	}

	return format
}

/**
 * Format with the default options.
 *
 * @example
 * format('~a has ~d item~a', 'cart', 3, 's') // 'cart has 3 items'
 * format(true, 'done~%')                     // writes to stdout
 *
 * @throws {FormatError} On a malformed template or an argument mismatch
 */
export const format: Formatter = createFormatter()
