import { ManualReloadTrigger } from "../manual-reload-trigger"

describe("ManualReloadTrigger", () => {
  it("delivers fire() to every subscriber until it unsubscribes", () => {
    const trigger = new ManualReloadTrigger("admin")
    const first = vi.fn()
    const second = vi.fn()

    const unsubscribe = trigger.subscribe(first)
    trigger.subscribe(second)
    trigger.fire()
    unsubscribe()
    trigger.fire()

    expect(trigger.name).toBe("admin")
    expect(first).toHaveBeenCalledTimes(1)
    expect(second).toHaveBeenCalledTimes(2)
    expect(trigger.subscriberCount).toBe(1)
  })
})
