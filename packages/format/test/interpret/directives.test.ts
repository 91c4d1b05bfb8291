import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DIRECTIVES, directiveFor, helpText } from '../../src/interpret/directives.ts'

describe('interpret/directives', () => {
	it('should find directives by any of their codes', () => {
		assert.strictEqual(directiveFor('?'), directiveFor('k'))
		assert.strictEqual(directiveFor('f')?.consumes, 1)
		assert.strictEqual(directiveFor('q'), undefined)
	})

	it('should give every code to one directive', () => {
		const codes = DIRECTIVES.flatMap((info) => info.codes)
		assert.strictEqual(new Set(codes).size, codes.length)
	})

	it('should describe every directive in the help text', () => {
		const lines = helpText().split('\n')
		assert.strictEqual(lines[0], 'Directives (codes are case-insensitive):')
		assert.strictEqual(lines[1], '  ~a      (1 arg)   any value, human-readable (display)')
		assert.strictEqual(lines.length, DIRECTIVES.length + 3)
		assert.strictEqual(lines.at(-2), 'Every argument must be consumed exactly once.')
		assert.strictEqual(lines.at(-1), '')
	})
})
