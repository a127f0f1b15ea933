export type CommandHandler = () => Promise<number>

export type CommandHandlerMap = ReadonlyMap<string, CommandHandler>

const createHandlerMap = (entries: ReadonlyArray<readonly [string, CommandHandler]>): CommandHandlerMap => {
  return new Map(entries)
}

export const dispatchCommandHandler = async ({
  command,
  handlers,
}: {
  readonly command: string
  readonly handlers: CommandHandlerMap
}): Promise<number | undefined> => {
  const handler = handlers.get(command)
  if (handler === undefined) {
    return undefined
  }
  return await handler()
}

export const createStatusCommandHandlers = ({
  initHandler,
  listHandler,
}: {
  readonly initHandler: CommandHandler
  readonly listHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["init", initHandler],
    ["list", listHandler],
  ])
}

export const createWorktreeCommandHandlers = ({
  createHandler,
  loadHandler,
  openHandler,
  deleteHandler,
}: {
  readonly createHandler: CommandHandler
  readonly loadHandler: CommandHandler
  readonly openHandler: CommandHandler
  readonly deleteHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["create", createHandler],
    ["load", loadHandler],
    ["open", openHandler],
    ["delete", deleteHandler],
  ])
}

export const createRegistryCommandHandlers = ({
  repositoryHandler,
  workspaceHandler,
}: {
  readonly repositoryHandler: CommandHandler
  readonly workspaceHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["repository", repositoryHandler],
    ["workspace", workspaceHandler],
  ])
}
