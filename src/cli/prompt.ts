import * as clack from '@clack/prompts'
import type {Prompt} from '../core/installer.js'

/**
 * Prompt backed by @clack/prompts. Cancelling (Ctrl+C, Esc) answers "no".
 */
export function createClackPrompt(): Prompt {
  return {
    async confirm(message: string): Promise<boolean> {
      const result = await clack.confirm({message, initialValue: false})
      if (clack.isCancel(result)) {
        return false
      }

      return result
    }
  }
}

/** Prompt answering every question the same way, for non-interactive runs. */
export function fixedPrompt(answer: boolean): Prompt {
  return {
    async confirm(): Promise<boolean> {
      return answer
    }
  }
}
