import type { LifecycleHook } from "@cantus/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:songs:worker",
      fn: async () => {
        await context.services.songs.worker.stop()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
