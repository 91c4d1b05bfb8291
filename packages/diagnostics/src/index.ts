/**
 * @tildefmt/diagnostics
 *
 * Shared diagnostic types and definitions for tildefmt packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TFCLI001,
	TFCLI002,
	TFCLI003,
	TFCLI004,
} from './cli.ts'
export {
	FORMAT_DIAGNOSTICS,
	type FormatDiagnosticCode,
	TFARG001,
	TFARG002,
	TFREAD001,
	TFSCAN001,
	TFSCAN002,
	TFSCAN003,
	TFSCAN004,
	TFSCAN005,
	TFTYPE001,
	TFTYPE002,
	TFTYPE003,
	TFTYPE004,
	TFTYPE005,
} from './format.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { FORMAT_DIAGNOSTICS } from './format.ts'
import { interpolateMessage } from './interpolate.ts'
import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...FORMAT_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}

/**
 * Render a diagnostic as `[CODE] message` with its arguments applied.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
