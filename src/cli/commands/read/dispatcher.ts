import { EXIT_CODE } from "../../../core/constants"
import { createCliError } from "../../../core/errors"
import type { CommandContext } from "../../runtime/command-context"

export type InformationalRequest =
  | { readonly kind: "version" }
  | { readonly kind: "general-help" }
  | { readonly kind: "command-help"; readonly name: string; readonly strict: boolean }

/**
 * Classifies runs that only print help or the version. `strict` marks `help <name>`, where an
 * unknown name is an error rather than a fallback to the general help.
 */
export const resolveInformationalRequest = ({
  command,
  positionals,
  parsedArgs,
}: Pick<CommandContext, "command" | "positionals" | "parsedArgs">): InformationalRequest | null => {
  if (parsedArgs.help === true) {
    return positionals.length > 0 && command !== "help"
      ? { kind: "command-help", name: command, strict: false }
      : { kind: "general-help" }
  }
  if (parsedArgs.version === true) {
    return { kind: "version" }
  }
  if (positionals.length === 0) {
    return { kind: "general-help" }
  }
  if (command !== "help") {
    return null
  }
  const target = positionals[1]
  return target === undefined || target.length === 0
    ? { kind: "general-help" }
    : { kind: "command-help", name: target, strict: true }
}

export type InformationalRenderer<Entry> = {
  readonly version: string
  readonly entries: readonly Entry[]
  readonly nameOf: (entry: Entry) => string
  readonly renderGeneral: (input: { readonly version: string }) => string
  readonly renderCommand: (input: { readonly entry: Entry }) => string
}

/** Prints help or the version; returns null when the run is a regular command. */
export const dispatchInformationalCommands = <Entry>({
  context,
  renderer,
  stdout,
}: {
  readonly context: Pick<CommandContext, "command" | "positionals" | "parsedArgs">
  readonly renderer: InformationalRenderer<Entry>
  readonly stdout: (line: string) => void
}): number | null => {
  const request = resolveInformationalRequest(context)
  if (request === null) {
    return null
  }

  if (request.kind === "version") {
    stdout(renderer.version)
    return EXIT_CODE.OK
  }

  if (request.kind === "command-help") {
    const entry = renderer.entries.find((candidate) => renderer.nameOf(candidate) === request.name)
    if (entry !== undefined) {
      stdout(`${renderer.renderCommand({ entry })}\n`)
      return EXIT_CODE.OK
    }
    if (request.strict) {
      throw createCliError("UNKNOWN_COMMAND", {
        message: `Unknown command for help: ${request.name}`,
        details: { requested: request.name, availableCommands: renderer.entries.map(renderer.nameOf) },
      })
    }
  }

  stdout(`${renderer.renderGeneral({ version: renderer.version })}\n`)
  return EXIT_CODE.OK
}
