import type { Clock, Milliseconds } from "@cantus/clock"
import type { Logger } from "@cantus/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
}

export type RunHooksPolicy = {
  /** Stop after the first failing hook. */
  failFast?: boolean
}

export type RunHooksResult = {
  failures: HookFailure[]
  timedOut: boolean
}

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks one after another against a shared deadline. Each hook gets an
 * abort signal that fires when the deadline passes; once it has passed the
 * remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await attemptHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)

      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function attemptHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const remaining = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
  const label = ctx.phase === "startup" ? "Startup" : "Shutdown"

  if (remaining <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks after deadline`, { hook: hook.name })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)
  const expired = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })

    if (expired()) {
      ctx.logger.warn(`${label} deadline exceeded in hook`, { hook: hook.name })
      return { timedOut: true }
    }

    ctx.logger.info(`Ran ${ctx.phase} hook`, { hook: hook.name })
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${label} hook failed`, { hook: hook.name, err })

    return { failure: { hook: hook.name, error: err }, timedOut: expired() }
  } finally {
    clearTimeout(timer)
  }
}
