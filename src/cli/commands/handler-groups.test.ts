import { describe, expect, it } from "vitest"
import {
  createRegistryCommandHandlers,
  createStatusCommandHandlers,
  createWorktreeCommandHandlers,
  dispatchCommandHandler,
} from "./handler-groups"

describe("handler-groups", () => {
  it("dispatches matching command handler", async () => {
    const handlers = createWorktreeCommandHandlers({
      createHandler: async () => 10,
      loadHandler: async () => 20,
      openHandler: async () => 30,
      deleteHandler: async () => 40,
    })

    const exitCode = await dispatchCommandHandler({
      command: "open",
      handlers,
    })

    expect(exitCode).toBe(30)
  })

  it("returns undefined when command is not handled", async () => {
    const handlers = createStatusCommandHandlers({
      initHandler: async () => 10,
      listHandler: async () => 20,
    })

    const exitCode = await dispatchCommandHandler({
      command: "create",
      handlers,
    })

    expect(exitCode).toBeUndefined()
  })

  it("creates registry handlers in expected command order", () => {
    const handlers = createRegistryCommandHandlers({
      repositoryHandler: async () => 1,
      workspaceHandler: async () => 1,
    })

    expect([...handlers.keys()]).toEqual(["repository", "workspace"])
  })
})
