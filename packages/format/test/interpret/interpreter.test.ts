import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type Datum, list } from '../../src/core/datum.ts'
import { OutputSink } from '../../src/core/sink.ts'
import { type InterpretContext, interpret, type Renderers } from '../../src/interpret/interpreter.ts'

function tagging(tag: string): (value: Datum) => string {
	return (value) => `${tag}(${String(value)})`
}

function contextFor(sink: OutputSink): InterpretContext {
	const renderers: Renderers = {
		display: tagging('display'),
		prettyPrint: tagging('pretty'),
		write: tagging('write'),
		writeShared: tagging('shared'),
	}
	return { helpText: 'HELP', renderers, sink }
}

describe('interpret/interpreter', () => {
	it('should route each consuming directive to its renderer', () => {
		const sink = new OutputSink()
		interpret('~a ~s ~w ~y', [1, 2, 3, 4], contextFor(sink))
		assert.strictEqual(sink.text(), 'display(1) write(2) shared(3) pretty(4)')
	})

	it('should write the context help text for ~h', () => {
		const sink = new OutputSink()
		interpret('~h', [], contextFor(sink))
		assert.strictEqual(sink.text(), 'HELP')
	})

	it('should share the sink with sub-templates', () => {
		const sink = new OutputSink()
		sink.write('before')
		interpret('~?', ['~&~a', list('x')], contextFor(sink))
		assert.strictEqual(sink.text(), 'before\ndisplay(x)')
	})
})
