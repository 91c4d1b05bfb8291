/**
 * Formatter diagnostic definitions.
 *
 * Error code format: TF<PHASE><NUMBER>
 * - TFSCAN: Template scanner errors (001-099)
 * - TFARG: Argument consumption errors (001-099)
 * - TFTYPE: Argument shape errors (001-099)
 * - TFREAD: Datum reader errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// SCANNER ERRORS (TFSCAN001-099)
// =============================================================================

export const TFSCAN001: DiagnosticDef = {
	code: 'TFSCAN001',
	description: 'The template ends with a lone `~`, so there is no directive code to read.',
	message: 'directive marker at end of template',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write `~~` for a literal tilde, or finish the directive.',
}

export const TFSCAN002: DiagnosticDef = {
	code: 'TFSCAN002',
	description: 'Width and precision digits must be followed by the `F` directive code.',
	message: 'unterminated parameters "{params}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'End the directive with `F`, as in `~8,2F`.',
}

export const TFSCAN003: DiagnosticDef = {
	code: 'TFSCAN003',
	description: 'Only the fixed-format directive takes width and precision parameters.',
	message: 'parameters "{params}" given to ~{code}, expected ~F',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Drop the digits, or use `~{params}F` for fixed format.',
}

export const TFSCAN004: DiagnosticDef = {
	code: 'TFSCAN004',
	description: 'Fixed-format parameters are a width, optionally followed by a comma and a precision.',
	message: 'malformed parameters "{params}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `~wF`, `~w,dF` or `~,dF` with non-negative integers up to 10000.',
}

export const TFSCAN005: DiagnosticDef = {
	code: 'TFSCAN005',
	description: "This directive code isn't one the formatter knows.",
	message: 'unknown directive ~{code}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run `tildefmt directives` or format `~h` to list the directives.',
}

// =============================================================================
// ARGUMENT ERRORS (TFARG001-099)
// =============================================================================

export const TFARG001: DiagnosticDef = {
	code: 'TFARG001',
	description: 'A directive needs an argument but every argument has already been used.',
	message: 'too few arguments: ~{code} needs an argument after {consumed} consumed',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass one argument per consuming directive.',
}

export const TFARG002: DiagnosticDef = {
	code: 'TFARG002',
	description: 'The template finished while arguments were still left over.',
	message: 'too many arguments: {remaining} left unused of {total}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the extra arguments, or add directives that consume them.',
}

// =============================================================================
// TYPE ERRORS (TFTYPE001-099)
// =============================================================================

export const TFTYPE001: DiagnosticDef = {
	code: 'TFTYPE001',
	description: 'Radix directives render integers only.',
	message: '~{code} expects an integer, got {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Round the value first, or render it with `~a` or `~F`.',
}

export const TFTYPE002: DiagnosticDef = {
	code: 'TFTYPE002',
	description: 'The `~c` directive writes exactly one character value.',
	message: '~c expects a character, got {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a character, or use `~a` for strings.',
}

export const TFTYPE003: DiagnosticDef = {
	code: 'TFTYPE003',
	description: 'Fixed format pads strings and numbers only.',
	message: '~F expects a string or a number, got {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Render other values with `~a` or `~s`.',
}

export const TFTYPE004: DiagnosticDef = {
	code: 'TFTYPE004',
	description: 'Indirection takes a template string first.',
	message: '~{code} expects a template string, got {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass the sub-template before its argument list.',
}

export const TFTYPE005: DiagnosticDef = {
	code: 'TFTYPE005',
	description: 'Indirection takes the sub-template arguments as one list or vector.',
	message: '~{code} expects an argument list, got {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Wrap the sub-template arguments in a proper list.',
}

// =============================================================================
// READER ERRORS (TFREAD001-099)
// =============================================================================

export const TFREAD001: DiagnosticDef = {
	code: 'TFREAD001',
	description: "The text isn't a valid external representation of a datum.",
	message: 'cannot read datum: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Quote strings with double quotes and balance parentheses.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all formatter diagnostics.
 */
export const FORMAT_DIAGNOSTICS = {
	// Argument errors
	TFARG001,
	TFARG002,
	// Reader errors
	TFREAD001,
	// Scanner errors
	TFSCAN001,
	TFSCAN002,
	TFSCAN003,
	TFSCAN004,
	TFSCAN005,
	// Type errors
	TFTYPE001,
	TFTYPE002,
	TFTYPE003,
	TFTYPE004,
	TFTYPE005,
} as const

/**
 * All valid formatter diagnostic codes.
 */
export type FormatDiagnosticCode = keyof typeof FORMAT_DIAGNOSTICS
