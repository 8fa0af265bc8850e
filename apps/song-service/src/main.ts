import { PinoLogger } from "@cantus/logger"
import { run } from "./server"

run().catch((err: unknown) => {
  new PinoLogger().fatal("Song service failed to start", { err })
  process.exit(1)
})
