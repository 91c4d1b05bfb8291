import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ArgumentOverflowError, ArgumentUnderflowError } from '../../src/core/errors.ts'
import { ArgumentCursor } from '../../src/interpret/cursor.ts'
import { type DirectiveToken, TokenKind } from '../../src/scan/scanner.ts'

const directive: DirectiveToken = { code: 'a', kind: TokenKind.Directive, offset: 4 }

describe('interpret/cursor', () => {
	it('should hand out arguments in order', () => {
		const cursor = new ArgumentCursor(['x', 'y'])
		assert.strictEqual(cursor.next(directive), 'x')
		assert.strictEqual(cursor.next(directive), 'y')
		assert.strictEqual(cursor.consumed, 2)
		assert.strictEqual(cursor.remaining, 0)
		cursor.finish(10)
	})

	it('should hand out undefined arguments like any other', () => {
		const cursor = new ArgumentCursor([undefined])
		assert.strictEqual(cursor.next(directive), undefined)
		assert.strictEqual(cursor.remaining, 0)
	})

	it('should fail when a directive needs more arguments than remain', () => {
		const cursor = new ArgumentCursor([1])
		cursor.next(directive)
		assert.throws(
			() => cursor.next(directive),
			(error: unknown) =>
				error instanceof ArgumentUnderflowError &&
				error.offset === 4 &&
				error.message === '[TFARG001] offset 4: too few arguments: ~a needs an argument after 1 consumed'
		)
	})

	it('should fail when arguments are left over', () => {
		const cursor = new ArgumentCursor([1, 2, 3])
		cursor.next(directive)
		assert.throws(
			() => cursor.finish(7),
			(error: unknown) =>
				error instanceof ArgumentOverflowError &&
				error.kind === 'ArgumentOverflow' &&
				error.message === '[TFARG002] offset 7: too many arguments: 2 left unused of 3'
		)
	})
})
