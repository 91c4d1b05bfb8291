import assert from 'node:assert'
import { describe, it } from 'node:test'
import { char, cons, list, NIL, type Pair, sym } from '../src/core/datum.ts'
import {
	ArgumentOverflowError,
	ArgumentUnderflowError,
	FormatError,
	MalformedDirectiveError,
	TypeMismatchError,
} from '../src/core/errors.ts'
import { complex, inexact, ratio } from '../src/core/numbers.ts'
import { OutputSink } from '../src/core/sink.ts'
import { createFormatter, format } from '../src/format.ts'
import { helpText } from '../src/interpret/directives.ts'

function collectingPort(): { chunks: string[]; write(chunk: string): void } {
	const chunks: string[] = []
	return { chunks, write: (chunk: string) => chunks.push(chunk) }
}

function cyclicList(): Pair {
	const head = cons(sym('a'), NIL)
	head.cdr = cons(sym('b'), cons(sym('c'), head))
	return head
}

function formatError(run: () => unknown): FormatError {
	try {
		run()
	} catch (error: unknown) {
		if (error instanceof FormatError) return error
		throw error
	}
	assert.fail('expected a format error')
}

describe('format', () => {
	describe('literal text and simple directives', () => {
		it('should copy text without directives', () => {
			assert.strictEqual(format('hello'), 'hello')
			assert.strictEqual(format(''), '')
		})

		it('should emit the escape and whitespace directives', () => {
			assert.strictEqual(format('~~'), '~')
			assert.strictEqual(format('a~%b'), 'a\nb')
			assert.strictEqual(format('~t|~_|'), '\t| |')
		})

		it('should accept upper-case codes', () => {
			assert.strictEqual(format('~A/~S', 'x', 'x'), 'x/"x"')
		})
	})

	describe('consuming directives', () => {
		it('should display symbols without bars', () => {
			assert.strictEqual(format('~a', sym('hello world')), 'hello world')
			assert.strictEqual(format('~a ~s', sym('12'), sym('12')), '12 |12|')
		})

		it('should display and write values', () => {
			assert.strictEqual(format('~a and ~s', 'str', 'str'), 'str and "str"')
			assert.strictEqual(format('~a ~s', char('c'), char('c')), 'c #\\c')
		})

		it('should render integers in each radix', () => {
			assert.strictEqual(format('~D ~X ~O ~B', 255, 255, 8, 5), '255 ff 10 101')
		})

		it('should write characters', () => {
			assert.strictEqual(format('~c', char('z')), 'z')
		})

		it('should pretty-print with a trailing newline', () => {
			assert.strictEqual(format('~y', list(1, 2)), '(1 2)\n')
		})

		it('should write help text', () => {
			assert.strictEqual(format('~h'), helpText())
		})
	})

	describe('fixed format', () => {
		it('should round and pad', () => {
			assert.strictEqual(format('~8,2F', ratio(1, 3)), '    0.33')
			assert.strictEqual(format('~6F', 32), '    32')
			assert.strictEqual(format('~8,2F', 32), '   32.00')
			assert.strictEqual(format('~1,2F', 4321), '4321.00')
			assert.strictEqual(format('~8,3F', 'foo'), '     foo')
		})

		it('should format each part of a complex number', () => {
			assert.strictEqual(format('~,1F', complex(inexact(1.24), 2)), '1.2+2.0i')
		})

		it('should pad by characters, not code units', () => {
			assert.strictEqual(format('~3F', '😀'), '  😀')
		})

		it('should keep the sign of negative zero with a precision', () => {
			assert.strictEqual(format('~F|~,2F', inexact(-0), inexact(-0)), '-0.0|-0.00')
		})

		it('should reject widths too large to render', () => {
			const error = formatError(() => format('~9999999999F', 1))
			assert.ok(error instanceof MalformedDirectiveError)
			assert.strictEqual(error.code, 'TFSCAN004')
		})

		it('should write the natural form without parameters', () => {
			assert.strictEqual(format('~F', inexact(0.5)), '0.5')
		})
	})

	describe('indirection', () => {
		it('should run a sub-template on an argument list', () => {
			assert.strictEqual(format('~a ~? ~a', sym('a'), '~s', list(sym('new')), sym('test')), 'a new test')
		})

		it('should accept a vector of arguments', () => {
			assert.strictEqual(format('~k', '~a+~a', [1, 2]), '1+2')
		})

		it('should accept an empty argument list', () => {
			assert.strictEqual(format('[~?]', 'inner', NIL), '[inner]')
		})

		it('should nest', () => {
			assert.strictEqual(format('~?', '<~?>', list('~a', list(1))), '<1>')
		})

		it('should reject a non-string template', () => {
			const error = formatError(() => format('~?', 1, NIL))
			assert.ok(error instanceof TypeMismatchError)
			assert.strictEqual(error.code, 'TFTYPE004')
		})

		it('should reject improper argument lists', () => {
			assert.strictEqual(formatError(() => format('~?', '~a', 5)).code, 'TFTYPE005')
			assert.strictEqual(formatError(() => format('~?', '~a', cons(1, 2))).code, 'TFTYPE005')
		})

		it('should count sub-template arguments separately', () => {
			const underflow = formatError(() => format('~? after', '~a ~a', list(1)))
			assert.ok(underflow instanceof ArgumentUnderflowError)
			assert.strictEqual(underflow.offset, 3)

			const overflow = formatError(() => format('~?', '~a', list(1, 2)))
			assert.ok(overflow instanceof ArgumentOverflowError)
			assert.strictEqual(overflow.detail, 'too many arguments: 1 left unused of 2')
		})
	})

	describe('freshline', () => {
		it('should do nothing at the start of output', () => {
			assert.strictEqual(format('~&x'), 'x')
		})

		it('should not double a newline', () => {
			assert.strictEqual(format('~%~&'), '\n')
		})

		it('should end a partial line', () => {
			assert.strictEqual(format('x~&y'), 'x\ny')
		})

		it('should see output written by a sub-template', () => {
			assert.strictEqual(format('~?~&done', 'line~%', NIL), 'line\ndone')
			assert.strictEqual(format('~?~&done', 'line', NIL), 'line\ndone')
		})

		it('should carry over between calls to the same port', () => {
			const port = collectingPort()
			const formatter = createFormatter()
			formatter(port, 'line~%')
			formatter(port, '~&next')
			assert.deepStrictEqual(port.chunks, ['line', '\n', 'next'])
			assert.strictEqual(port.chunks.join(''), 'line\nnext')
		})

		it('should carry over between calls to the same sink', () => {
			const sink = new OutputSink()
			format(sink, 'a')
			format(sink, '~&b')
			assert.strictEqual(sink.text(), 'a\nb')
		})
	})

	describe('shared structure', () => {
		it('should label a circular list', () => {
			assert.strictEqual(format('~w', cyclicList()), '#1=(a b c . #1#)')
		})

		it('should label shared sublists with ~w only', () => {
			const shared = list(1)
			assert.strictEqual(format('~w', list(shared, shared)), '(#1=(1) #1#)')
			assert.strictEqual(format('~s', list(shared, shared)), '((1) (1))')
		})
	})

	describe('argument counting', () => {
		it('should reject leftover arguments', () => {
			const error = formatError(() => format('~a', 1, 2))
			assert.ok(error instanceof ArgumentOverflowError)
			assert.strictEqual(error.offset, 2)
			assert.strictEqual(error.message, '[TFARG002] offset 2: too many arguments: 1 left unused of 2')
		})

		it('should reject missing arguments', () => {
			const error = formatError(() => format('~a ~a', 1))
			assert.ok(error instanceof ArgumentUnderflowError)
			assert.strictEqual(error.message, '[TFARG001] offset 3: too few arguments: ~a needs an argument after 1 consumed')
		})

		it('should count undefined as an argument', () => {
			assert.strictEqual(format('~a', undefined), '#<unspecified>')
		})
	})

	describe('type checks', () => {
		it('should reject non-integers for radix directives', () => {
			const error = formatError(() => format('~x', 2.5))
			assert.ok(error instanceof TypeMismatchError)
			assert.strictEqual(error.detail, '~x expects an integer, got 2.5')
		})

		it('should reject non-characters for ~c', () => {
			assert.strictEqual(formatError(() => format('~c', 'z')).detail, '~c expects a character, got "z"')
		})

		it('should reject symbols for ~F', () => {
			assert.strictEqual(formatError(() => format('~F', sym('x'))).code, 'TFTYPE003')
		})
	})

	describe('malformed templates', () => {
		it('should reject unknown directives', () => {
			const error = formatError(() => format('~q'))
			assert.ok(error instanceof MalformedDirectiveError)
			assert.strictEqual(error.message, '[TFSCAN005] offset 0: unknown directive ~q')
		})

		it('should reject a negative width as an unknown directive', () => {
			assert.strictEqual(formatError(() => format('~-3F', 1)).message, '[TFSCAN005] offset 0: unknown directive ~-')
		})

		it('should reject parameters on other directives', () => {
			assert.strictEqual(formatError(() => format('~2a', 1)).code, 'TFSCAN003')
		})
	})

	describe('destinations', () => {
		it('should return text for destination false', () => {
			assert.strictEqual(format(false, '~a!', 1), '1!')
		})

		it('should write to the default output for destination true', () => {
			const port = collectingPort()
			const formatter = createFormatter({ defaultOutput: port })
			assert.strictEqual(formatter(true, '~a~%', 1), undefined)
			assert.deepStrictEqual(port.chunks, ['1', '\n'])
		})

		it('should keep output written before an error', () => {
			const port = collectingPort()
			assert.throws(() => format(port, 'abc~a'), ArgumentUnderflowError)
			assert.deepStrictEqual(port.chunks, ['abc'])

			const sink = new OutputSink()
			assert.throws(() => format(sink, 'abc~'), MalformedDirectiveError)
			assert.strictEqual(sink.text(), 'abc')
		})
	})

	describe('createFormatter options', () => {
		it('should use custom renderers', () => {
			const formatter = createFormatter({ display: () => 'X', write: (value) => `<${String(value)}>` })
			assert.strictEqual(formatter('~a ~s', 1, 2), 'X <2>')
		})

		it('should use the configured pretty width', () => {
			const formatter = createFormatter({ prettyWidth: 10 })
			assert.strictEqual(formatter('~y', list(1, 2, 3, 4, 5)), '(1\n 2\n 3\n 4\n 5)\n')
		})
	})
})
