/**
 * The directive table, shared by the interpreter, the `~h` help text and the CLI.
 */

export interface DirectiveInfo {
	/** Lower-case codes that select this directive */
	readonly codes: readonly string[]
	/** How the directive is written in a template */
	readonly syntax: string
	/** Number of arguments consumed */
	readonly consumes: 0 | 1 | 2
	readonly summary: string
}

export const DIRECTIVES: readonly DirectiveInfo[] = [
	{ codes: ['a'], consumes: 1, summary: 'any value, human-readable (display)', syntax: '~a' },
	{ codes: ['s'], consumes: 1, summary: 'any value, machine-readable (write)', syntax: '~s' },
	{ codes: ['w'], consumes: 1, summary: 'any value, write with shared structure labels', syntax: '~w' },
	{ codes: ['d'], consumes: 1, summary: 'integer in decimal', syntax: '~d' },
	{ codes: ['x'], consumes: 1, summary: 'integer in hexadecimal', syntax: '~x' },
	{ codes: ['o'], consumes: 1, summary: 'integer in octal', syntax: '~o' },
	{ codes: ['b'], consumes: 1, summary: 'integer in binary', syntax: '~b' },
	{ codes: ['c'], consumes: 1, summary: 'character, verbatim', syntax: '~c' },
	{ codes: ['y'], consumes: 1, summary: 'list, pretty-printed', syntax: '~y' },
	{ codes: ['?', 'k'], consumes: 2, summary: 'template and argument list, formatted in place', syntax: '~? ~k' },
	{ codes: ['f'], consumes: 1, summary: 'string or number, padded to w with d decimals', syntax: '~w,dF' },
	{ codes: ['~'], consumes: 0, summary: 'tilde', syntax: '~~' },
	{ codes: ['t'], consumes: 0, summary: 'tab', syntax: '~t' },
	{ codes: ['%'], consumes: 0, summary: 'newline', syntax: '~%' },
	{ codes: ['&'], consumes: 0, summary: 'newline unless at the start of a line', syntax: '~&' },
	{ codes: ['_'], consumes: 0, summary: 'space', syntax: '~_' },
	{ codes: ['h'], consumes: 0, summary: 'this help', syntax: '~h' },
]

const byCode = new Map<string, DirectiveInfo>(
	DIRECTIVES.flatMap((info) => info.codes.map((code): [string, DirectiveInfo] => [code, info]))
)

/** Looks up a directive by its lower-case code. */
export function directiveFor(code: string): DirectiveInfo | undefined {
	return byCode.get(code)
}

function helpLine(info: DirectiveInfo): string {
	const arity = info.consumes === 0 ? '' : info.consumes === 1 ? '(1 arg)' : '(2 args)'
	return `  ${info.syntax.padEnd(8)}${arity.padEnd(10)}${info.summary}`
}

/** Multi-line description of every directive; ends with a newline. */
export function helpText(): string {
	const lines = [
		'Directives (codes are case-insensitive):',
		...DIRECTIVES.map(helpLine),
		'Every argument must be consumed exactly once.',
	]
	return `${lines.join('\n')}\n`
}
