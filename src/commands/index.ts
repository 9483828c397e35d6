export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { commands } from './commands'
export { OpenPrompt, PROMPT_HEADER, INVALID_CHOICE_MESSAGE } from './OpenPrompt'
export { SystemFileOpener, openerCommandFor } from './SystemFileOpener'
