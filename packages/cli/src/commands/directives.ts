import { BaseCommand } from '@adonisjs/ace'
import { helpText } from '@tildefmt/format'

export default class DirectivesCommand extends BaseCommand {
	static override commandName = 'directives'
	static override description = 'List the template directives'

	override async run(): Promise<void> {
		this.logger.log(helpText().trimEnd())
	}
}
