import type { Logger } from "../utils/logger"
import { ensureCliError, toErrorMessage, type ErrorCode } from "./errors"
import type { HookContext, HookManager, HookPhase } from "./hook-manager"

/** A hook failure that happened after the primary action succeeded. */
export type OperationWarning = {
  readonly phase: HookPhase
  readonly code: ErrorCode
  readonly message: string
}

export type OperationRunner = {
  /**
   * Runs `body` between the operation's pre hooks and, on failure, its error hooks.
   * The original error is always rethrown.
   */
  run: <T>(ctx: HookContext, body: () => Promise<T>) => Promise<T>
  /** Runs a hook phase whose failure is reported instead of thrown. */
  runTolerated: (input: {
    readonly phase: HookPhase
    readonly run: () => Promise<void>
    readonly warnings: OperationWarning[]
  }) => Promise<void>
}

export const createOperationRunner = ({
  hooks,
  logger,
}: {
  readonly hooks: HookManager
  readonly logger?: Logger
}): OperationRunner => {
  return {
    run: async (ctx, body) => {
      try {
        await hooks.executePreHooks(ctx.operation, ctx)
        return await body()
      } catch (error) {
        ctx.error = error instanceof Error ? error : ensureCliError(error)
        try {
          await hooks.executeErrorHooks(ctx.operation, ctx)
        } catch (hookError) {
          logger?.warn(toErrorMessage(hookError))
        }
        throw error
      }
    },
    runTolerated: async ({ phase, run, warnings }) => {
      try {
        await run()
      } catch (error) {
        const cliError = ensureCliError(error)
        warnings.push({ phase, code: cliError.code, message: cliError.message })
        logger?.warn(cliError.message)
      }
    },
  }
}
