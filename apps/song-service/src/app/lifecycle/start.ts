import type { LifecycleHook } from "@cantus/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { songs, logger } = context.services

  const hooks: LifecycleHook[] = [
    {
      name: "start:songs:restore",
      fn: async () => {
        const report = await songs.orchestrator.restore()
        if (report.unresolved.length > 0) {
          logger.warn("Some completed jobs have no outputs", { jobIds: report.unresolved })
        }
      },
    },
  ]

  if (context.config.songs.worker.enabled) {
    hooks.push({
      name: "start:songs:worker",
      fn: async () => {
        await songs.worker.start()
      },
    })
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
