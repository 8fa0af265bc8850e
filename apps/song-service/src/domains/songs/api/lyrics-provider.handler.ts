import { type Context, parseOrThrow, type RequestHandler, ValidationError } from "@cantus/server"
import type { SongServices } from "../composition"
import {
  isProviderName,
  type ProviderInfo,
  providerNames,
  type SwitchProviderResult,
} from "../model/lyrics.model"
import { switchProviderRequestSchema } from "./lyrics.api.schema"
import { readJsonBody } from "./read-json-body"

export function getProviderHandler({ lyrics }: SongServices): RequestHandler {
  return async (c: Context) => c.json<ProviderInfo>(lyrics.providerInfo())
}

export function switchProviderHandler({ lyrics }: SongServices): RequestHandler {
  return async (c: Context) => {
    const { provider } = parseOrThrow(switchProviderRequestSchema, await readJsonBody(c))

    if (!isProviderName(provider)) {
      throw ValidationError.field(
        "provider",
        `Unknown provider ${provider}. Choose one of: ${providerNames.join(", ")}`,
      )
    }

    return c.json<SwitchProviderResult>(await lyrics.switchProvider(provider))
  }
}
