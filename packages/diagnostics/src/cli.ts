/**
 * CLI diagnostic definitions.
 *
 * Error code format: TFCLI<NUMBER>
 * - TFCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TFCLI001-099)
// =============================================================================

export const TFCLI001: DiagnosticDef = {
	code: 'TFCLI001',
	description: "tildefmt couldn't save the output file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const TFCLI002: DiagnosticDef = {
	code: 'TFCLI002',
	description: "One of the data arguments couldn't be read as a datum.",
	message: 'cannot read argument {index}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Quote strings as "text", or pass --strings to skip reading.',
}

export const TFCLI003: DiagnosticDef = {
	code: 'TFCLI003',
	description: 'Something unexpected went wrong while formatting.',
	message: 'format failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the template and arguments, or report this if it seems like a bug.',
}

export const TFCLI004: DiagnosticDef = {
	code: 'TFCLI004',
	description: 'The pretty-printer width must be a positive whole number.',
	message: 'invalid width "{width}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass something like `--width 79`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TFCLI001,
	TFCLI002,
	TFCLI003,
	TFCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
