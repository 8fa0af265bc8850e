import { describe, expect, it } from "vitest"
import { JobQueue } from "../job-queue"

describe("JobQueue", () => {
  it("hands items out in FIFO order", async () => {
    const queue = new JobQueue<string>()
    queue.enqueue("a")
    queue.enqueue("b")

    await expect(queue.take()).resolves.toBe("a")
    await expect(queue.take()).resolves.toBe("b")
    expect(queue.size).toBe(0)
  })

  it("reports the number of items ahead, and null once taken", async () => {
    const queue = new JobQueue<string>()
    queue.enqueue("a")
    queue.enqueue("b")
    queue.enqueue("c")

    expect(queue.position("a")).toBe(0)
    expect(queue.position("c")).toBe(2)

    await queue.take()

    expect(queue.position("a")).toBeNull()
    expect(queue.position("c")).toBe(1)
    expect(queue.position("missing")).toBeNull()
  })

  it("wakes a waiting consumer on enqueue", async () => {
    const queue = new JobQueue<string>()

    const taken = queue.take()
    expect(queue.waiting).toBe(1)

    queue.enqueue("a")

    await expect(taken).resolves.toBe("a")
    expect(queue.size).toBe(0)
    expect(queue.waiting).toBe(0)
  })

  it("rejects a waiting take when the signal aborts", async () => {
    const queue = new JobQueue<string>()
    const controller = new AbortController()

    const taken = queue.take(controller.signal)
    controller.abort(new Error("stopping"))

    await expect(taken).rejects.toThrow("stopping")
    expect(queue.waiting).toBe(0)

    queue.enqueue("a")
    expect(queue.size).toBe(1)
  })

  it("rejects immediately with an already aborted signal", async () => {
    const queue = new JobQueue<string>()
    queue.enqueue("a")
    const controller = new AbortController()
    controller.abort(new Error("stopped"))

    await expect(queue.take(controller.signal)).rejects.toThrow("stopped")
    expect(queue.size).toBe(1)
  })

  it("poll returns undefined when empty", () => {
    const queue = new JobQueue<number>()

    expect(queue.poll()).toBeUndefined()
    queue.enqueue(7)
    expect(queue.poll()).toBe(7)
  })
})
