import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    it("now() and nowMs() agree", () => {
      const clock = h.make()

      expect(Math.abs(clock.now().getTime() - clock.nowMs())).toBeLessThan(5)
    })

    it("sleep(0) resolves", async () => {
      await expect(h.make().sleep(0)).resolves.toBeUndefined()
    })

    it("sleep() resolves at once for an aborted signal", async () => {
      const ac = new AbortController()
      ac.abort()

      await expect(h.make().sleep(10_000, ac.signal)).resolves.toBeUndefined()
    })
  })
}
