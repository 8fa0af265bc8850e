import type { Clock, Milliseconds } from "@cantus/clock"
import type { Logger } from "@cantus/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No hook failed and the deadline held. */
  ok: boolean
  failures: HookFailure[]
  /** The deadline passed before every hook (or the listener close) finished. */
  timedOut: boolean
}

/** Closes the listener first, then runs every stop hook even if some fail. */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeListenerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failures: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeListenerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      if (signal.aborted) return

      let onAbort: (() => void) | undefined
      const aborted = new Promise<"aborted">((resolve) => {
        onAbort = () => resolve("aborted")
        signal.addEventListener("abort", onAbort, { once: true })
      })
      const closed = new Promise<Error | null | undefined>((resolve) => {
        server.close((err) => resolve(err))
      })

      try {
        const outcome = await Promise.race([closed, aborted])

        if (outcome instanceof Error) throw outcome
      } finally {
        if (onAbort) signal.removeEventListener("abort", onAbort)
      }
    },
  }
}
