import type { Logger } from "@cantus/logger"

export type ServerContextVariables = {
  requestId: string
  logger: Logger
}

declare module "hono" {
  interface ContextVariableMap extends ServerContextVariables {}
}
