import { type Datum, DEFAULT_PRETTY_WIDTH, FormatError, ReadError, read } from '@tildefmt/format'
import { interpolateMessage, TFCLI001, TFCLI002, TFCLI003, TFCLI004 } from '@tildefmt/diagnostics'

export type ParsedData = { ok: true; values: Datum[] } | { ok: false; message: string }

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadArgumentError(index: number, error: unknown): string {
	const reason = error instanceof ReadError ? error.detail : getErrorMessage(error)
	const message = interpolateMessage(TFCLI002.message, { index, reason })
	return `[${TFCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(TFCLI001.message, { reason: getErrorMessage(error) })
	return `[${TFCLI001.code}] ${message}`
}

export function formatInvalidWidthError(width: string): string {
	const message = interpolateMessage(TFCLI004.message, { width })
	return `[${TFCLI004.code}] ${message}`
}

export function formatFormatError(error: unknown): string {
	if (error instanceof FormatError) {
		return error.message
	}
	const message = interpolateMessage(TFCLI003.message, { reason: getErrorMessage(error) })
	return `[${TFCLI003.code}] ${message}`
}

/**
 * Turns command-line data arguments into format arguments.
 * Each one is read as a datum unless `asStrings` is set. Indexes in
 * messages are 1-based.
 */
export function parseDataArguments(data: readonly string[], asStrings: boolean): ParsedData {
	if (asStrings) return { ok: true, values: [...data] }
	const values: Datum[] = []
	for (const [index, text] of data.entries()) {
		try {
			values.push(read(text))
		} catch (error: unknown) {
			return { message: formatReadArgumentError(index + 1, error), ok: false }
		}
	}
	return { ok: true, values }
}

/**
 * Pretty-printer width from the `--width` flag; null when it is not a
 * positive whole number.
 */
export function parseWidth(value: string | undefined): number | null {
	if (value === undefined) return DEFAULT_PRETTY_WIDTH
	if (!/^\d+$/.test(value)) return null
	const width = Number(value)
	return width > 0 && Number.isSafeInteger(width) ? width : null
}
