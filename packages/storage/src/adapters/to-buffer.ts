import type { StorageData } from "../ports/storage-object"

export async function toBuffer(data: StorageData): Promise<Buffer> {
  if (Buffer.isBuffer(data)) return data
  if (data instanceof Uint8Array) return Buffer.from(data)

  const chunks: Buffer[] = []
  for await (const chunk of data) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
  return Buffer.concat(chunks)
}
