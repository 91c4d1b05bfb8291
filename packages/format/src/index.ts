/**
 * tildefmt Public API
 *
 * Template-driven text rendering with `~` directives:
 * - lazy scanner over the template
 * - exact argument consumption, recursive `~?` indirection
 * - fixed-format numbers and label-aware structure writing
 */

export {
	Char,
	type Compound,
	char,
	cons,
	type Datum,
	EmptyList,
	isCompound,
	isProperList,
	kindOf,
	list,
	listToArray,
	NIL,
	Pair,
	Sym,
	sym,
} from './core/datum.ts'
export {
	ArgumentOverflowError,
	ArgumentUnderflowError,
	FormatError,
	type FormatErrorKind,
	MalformedDirectiveError,
	ReadError,
	TypeMismatchError,
} from './core/errors.ts'
export {
	Complex,
	complex,
	Flonum,
	inexact,
	integerValue,
	isExactInteger,
	isInexact,
	isNumber,
	isReal,
	numberToString,
	Ratio,
	type Real,
	ratio,
	type SchemeNumber,
	toInexact,
} from './core/numbers.ts'
export { type OutputPort, OutputSink } from './core/sink.ts'
export {
	createFormatter,
	type Destination,
	type Formatter,
	type FormatterOptions,
	format,
} from './format.ts'
export { ArgumentCursor } from './interpret/cursor.ts'
export { DIRECTIVES, type DirectiveInfo, directiveFor, helpText } from './interpret/directives.ts'
export { type InterpretContext, interpret, type Renderers } from './interpret/interpreter.ts'
export { EXPONENT_THRESHOLD, fixedText, renderFixed, renderRadix } from './interpret/numeric.ts'
export { read, readAll } from './read/reader.ts'
export {
	type DirectiveToken,
	type FixedParams,
	type LiteralToken,
	scan,
	type Token,
	TokenKind,
	tokenize,
} from './scan/scanner.ts'
export { findCycleLabels, findSharedLabels, type LabelTable } from './write/labels.ts'
export { DEFAULT_PRETTY_WIDTH, prettyPrint } from './write/pretty.ts'
export { display, write, writeShared } from './write/writer.ts'
