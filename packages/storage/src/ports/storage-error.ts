import { BaseError } from "@cantus/errors"

export class StorageError extends BaseError<"storage_invalid_key"> {
  static invalidKey(key: string, reason: string) {
    return new StorageError(`Invalid storage key "${key}": ${reason}`, {
      code: "storage_invalid_key",
      context: { key },
    })
  }
}
