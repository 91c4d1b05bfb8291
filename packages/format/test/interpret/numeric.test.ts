import assert from 'node:assert'
import { describe, it } from 'node:test'
import { sym } from '../../src/core/datum.ts'
import { complex, inexact, ratio } from '../../src/core/numbers.ts'
import { fixedText, isRadixCode, renderFixed, renderRadix } from '../../src/interpret/numeric.ts'

describe('interpret/numeric', () => {
	describe('renderFixed', () => {
		it('should round a ratio to the precision and pad to the width', () => {
			assert.strictEqual(renderFixed(ratio(1, 3), { precision: 2, width: 8 }), '    0.33')
		})

		it('should keep exact integers natural without a precision', () => {
			assert.strictEqual(renderFixed(32, { width: 6 }), '    32')
		})

		it('should show the requested decimals for integers', () => {
			assert.strictEqual(renderFixed(32, { precision: 2, width: 8 }), '   32.00')
		})

		it('should never truncate to the width', () => {
			assert.strictEqual(renderFixed(4321, { precision: 2, width: 1 }), '4321.00')
		})

		it('should pad strings without changing them', () => {
			assert.strictEqual(renderFixed('foo', { precision: 3, width: 8 }), '     foo')
		})

		it('should count width in code points', () => {
			assert.strictEqual(renderFixed('😀', { width: 3 }), '  😀')
			assert.strictEqual(renderFixed('a😀b', { width: 3 }), 'a😀b')
		})

		it('should write inexact integers with a fraction', () => {
			assert.strictEqual(renderFixed(inexact(32), { width: 6 }), '  32.0')
		})

		it('should round each part of a complex number', () => {
			assert.strictEqual(renderFixed(complex(1, ratio(1, 3)), { precision: 2 }), '1.00+0.33i')
			assert.strictEqual(
				renderFixed(complex(inexact(1.5), -2), { precision: 1, width: 12 }),
				'    1.5-2.0i'
			)
		})

		it('should reject other values', () => {
			assert.strictEqual(renderFixed(sym('x'), {}), undefined)
			assert.strictEqual(renderFixed(true, { width: 4 }), undefined)
		})
	})

	describe('fixedText', () => {
		it('should round to the digit count', () => {
			assert.strictEqual(fixedText(2.4, 0), '2')
			assert.strictEqual(fixedText(2 / 3, 2), '0.67')
			assert.strictEqual(fixedText(-1.5, 3), '-1.500')
		})

		it('should switch to exponential notation for large magnitudes', () => {
			assert.strictEqual(fixedText(1e21, 2), '1.00e21')
			assert.strictEqual(fixedText(-2.5e22, 1), '-2.5e22')
		})

		it('should keep the sign of negative zero', () => {
			assert.strictEqual(fixedText(-0, 2), '-0.00')
			assert.strictEqual(fixedText(0, 2), '0.00')
			assert.strictEqual(renderFixed(inexact(-0), { precision: 1 }), '-0.0')
		})

		it('should pad precisions beyond what the platform converts', () => {
			assert.strictEqual(fixedText(1, 102), `1.${'0'.repeat(102)}`)
		})

		it('should spell non-finite values', () => {
			assert.strictEqual(fixedText(Number.NaN, 2), '+nan.0')
			assert.strictEqual(fixedText(Number.POSITIVE_INFINITY, 2), '+inf.0')
			assert.strictEqual(fixedText(Number.NEGATIVE_INFINITY, 2), '-inf.0')
		})
	})

	describe('renderRadix', () => {
		it('should render integers in each radix', () => {
			assert.strictEqual(renderRadix(255, 'x'), 'ff')
			assert.strictEqual(renderRadix(-255n, 'x'), '-ff')
			assert.strictEqual(renderRadix(8, 'o'), '10')
			assert.strictEqual(renderRadix(5, 'b'), '101')
			assert.strictEqual(renderRadix(2n ** 64n, 'd'), '18446744073709551616')
		})

		it('should accept integral inexact values', () => {
			assert.strictEqual(renderRadix(inexact(32), 'd'), '32')
		})

		it('should reject non-integers', () => {
			assert.strictEqual(renderRadix(2.5, 'd'), undefined)
			assert.strictEqual(renderRadix(ratio(1, 2), 'x'), undefined)
			assert.strictEqual(renderRadix('12', 'd'), undefined)
		})
	})

	describe('isRadixCode', () => {
		it('should only accept the radix directive codes', () => {
			assert.deepStrictEqual(
				['b', 'd', 'o', 'x', 'f', 'toString'].map(isRadixCode),
				[true, true, true, true, false, false]
			)
		})
	})
})
