import { type Compound, type Datum, isCompound, NIL, Pair } from '../core/datum.ts'
import { findCycleLabels, type LabelTable } from './labels.ts'
import { DatumEmitter } from './writer.ts'

export const DEFAULT_PRETTY_WIDTH = 79

/**
 * Width-aware writer behind `~y`.
 * A datum that fits on the rest of the line is written flat; otherwise its
 * elements go one per line, aligned one column past the opening bracket.
 * Breaking recurses once per nesting level, so data nested thousands of
 * levels deep exceed the call stack here, unlike `write`.
 */
class PrettyPrinter {
	private readonly labels: LabelTable
	private readonly width: number
	private readonly out: string[] = []
	private emitted = new Set<Compound>()
	private column = 0

	constructor(labels: LabelTable, width: number) {
		this.labels = labels
		this.width = width
	}

	print(value: Datum): string {
		this.datum(value)
		return this.out.join('')
	}

	private push(text: string): void {
		this.out.push(text)
		this.column += text.length
	}

	private newline(indent: number): void {
		this.out.push(`\n${' '.repeat(indent)}`)
		this.column = indent
	}

	private datum(value: Datum): void {
		const trial = new Set(this.emitted)
		const flat = new DatumEmitter(this.labels, false, trial).render(value)
		if (!isCompound(value) || this.column + flat.length <= this.width) {
			this.emitted = trial
			this.push(flat)
			return
		}

		const label = this.labels.get(value)
		if (label !== undefined) {
			if (this.emitted.has(value)) {
				this.push(`#${label}#`)
				return
			}
			this.emitted.add(value)
			this.push(`#${label}=`)
		}

		if (value instanceof Pair) {
			this.pair(value)
		} else {
			this.block('#(', value, NIL)
		}
	}

	private pair(head: Pair): void {
		const items: Datum[] = [head.car]
		let rest = head.cdr
		while (rest instanceof Pair && !this.labels.has(rest)) {
			items.push(rest.car)
			rest = rest.cdr
		}
		this.block('(', items, rest)
	}

	private block(open: string, items: readonly Datum[], tail: Datum): void {
		this.push(open)
		const indent = this.column
		items.forEach((item, index) => {
			if (index > 0) this.newline(indent)
			this.datum(item)
		})
		if (tail !== NIL) {
			this.newline(indent)
			this.push('. ')
			this.datum(tail)
		}
		this.push(')')
	}
}

/** Pretty-printed written form of a value, ending in a newline. */
export function prettyPrint(value: Datum, width = DEFAULT_PRETTY_WIDTH): string {
	return `${new PrettyPrinter(findCycleLabels(value), width).print(value)}\n`
}
