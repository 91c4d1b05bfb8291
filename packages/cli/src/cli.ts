#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import DirectivesCommand from './commands/directives.ts'
import FormatCommand from './commands/format.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tildefmt')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([FormatCommand, DirectivesCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`tildefmt v${version}`)
		console.log('')
		console.log('Usage: tildefmt format <template> [data...] [options]')
		console.log('')
		console.log('Run "tildefmt --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
