import type { Datum } from '../core/datum.ts'
import { ArgumentOverflowError, ArgumentUnderflowError } from '../core/errors.ts'
import type { DirectiveToken } from '../scan/scanner.ts'

/**
 * Forward-only cursor over one argument list.
 * Every argument must be consumed exactly once.
 */
export class ArgumentCursor {
	private readonly args: readonly Datum[]
	private position = 0

	constructor(args: readonly Datum[]) {
		this.args = args
	}

	get consumed(): number {
		return this.position
	}

	get remaining(): number {
		return this.args.length - this.position
	}

	/** Takes the next argument for `directive`. */
	next(directive: DirectiveToken): Datum {
		if (this.position >= this.args.length) {
			throw new ArgumentUnderflowError(directive.offset, {
				code: directive.code,
				consumed: this.position,
			})
		}
		const value = this.args[this.position]
		this.position++
		return value
	}

	/** Fails when arguments are left over; `offset` is where the scan ended. */
	finish(offset: number): void {
		if (this.remaining > 0) {
			throw new ArgumentOverflowError(offset, {
				remaining: this.remaining,
				total: this.args.length,
			})
		}
	}
}
