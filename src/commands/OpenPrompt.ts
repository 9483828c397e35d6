import { CommandRegistry } from './CommandRegistry'
import { CommandContext } from './types'
import { debugLog } from '../debug/debugLog'

export const PROMPT_HEADER = '\nPress Enter to open the created files, or choose one of the options:'
export const INVALID_CHOICE_MESSAGE = 'Invalid input or file not created.'

export type Ask = (question: string) => Promise<string>

/**
 * Offers to open the report files that were just written
 */
export class OpenPrompt {
  constructor(
    private registry: CommandRegistry,
    private ask: Ask
  ) {}

  menu(context: CommandContext): string[] {
    return this.registry
      .getAvailable(context.reports)
      .filter(command => command.label !== undefined)
      .map(command => `[${command.name}] ${command.label}`)
  }

  async run(context: CommandContext): Promise<void> {
    context.notify(PROMPT_HEADER)
    context.notify(this.menu(context).join('\n'))

    const answer = await this.ask('Your choice: ')
    const command = this.registry.get(answer)

    debugLog({ event: 'open_prompt_answer', answer, command: command?.name })

    if (!command || !command.isAvailable(context.reports)) {
      context.notify(INVALID_CHOICE_MESSAGE)
      return
    }
    await command.execute(context)
  }
}
