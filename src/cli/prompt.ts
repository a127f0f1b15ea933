import { createInterface } from "node:readline/promises"
import type { ConfirmPrompt } from "../core/worktree-orchestrator"

export const isAffirmative = (answer: string): boolean => {
  return /^y(es)?$/i.test(answer.trim())
}

export const createReadlineConfirm = ({
  input = process.stdin,
  output = process.stderr,
}: {
  readonly input?: NodeJS.ReadableStream
  readonly output?: NodeJS.WritableStream
} = {}): ConfirmPrompt => {
  return async (message) => {
    const readline = createInterface({ input, output })
    try {
      return isAffirmative(await readline.question(`${message} [y/N] `))
    } finally {
      readline.close()
    }
  }
}
