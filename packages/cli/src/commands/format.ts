import { writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { createFormatter, type Datum, type Formatter } from '@tildefmt/format'
import {
	formatFormatError,
	formatInvalidWidthError,
	formatWriteError,
	parseDataArguments,
	parseWidth,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Render a template with ~ directives'

	@args.string({ description: 'Template, e.g. "~a is ~d~%"' })
	declare template: string

	@args.spread({ description: 'Arguments, each read as a datum', required: false })
	declare data?: string[]

	@flags.string({ alias: 'o', description: 'Write the result to a file instead of stdout' })
	declare output?: string

	@flags.boolean({ alias: 's', description: 'Pass arguments as plain strings' })
	declare strings: boolean

	@flags.string({ alias: 'w', description: 'Line width for ~y pretty-printing' })
	declare width?: string

	private buildFormatter(): Formatter | null {
		const width = parseWidth(this.width)
		if (width === null) {
			this.logger.error(formatInvalidWidthError(this.width ?? ''))
			this.exitCode = 1
			return null
		}
		return createFormatter({ defaultOutput: process.stdout, prettyWidth: width })
	}

	private readData(): Datum[] | null {
		const parsed = parseDataArguments(this.data ?? [], this.strings)
		if (!parsed.ok) {
			this.logger.error(parsed.message)
			this.exitCode = 1
			return null
		}
		return parsed.values
	}

	private render(format: Formatter, values: Datum[]): string | null {
		try {
			return format(this.template, ...values)
		} catch (error: unknown) {
			this.logger.error(formatFormatError(error))
			this.exitCode = 1
			return null
		}
	}

	private printToStdout(format: Formatter, values: Datum[]): void {
		try {
			format(true, this.template, ...values)
		} catch (error: unknown) {
			this.logger.error(formatFormatError(error))
			this.exitCode = 1
		}
	}

	private async writeOutputFile(outputPath: string, content: string): Promise<void> {
		try {
			await writeFile(outputPath, content)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const format = this.buildFormatter()
		if (format === null) return

		const values = this.readData()
		if (values === null) return

		if (this.output === undefined) {
			this.printToStdout(format, values)
			return
		}

		const text = this.render(format, values)
		if (text === null) return

		await this.writeOutputFile(this.output, text)
	}
}
