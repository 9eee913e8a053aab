import { describe, expect, it, vi } from "vitest"
import { ProxyState } from "./state.js"

describe("ProxyState", () => {
  it("tracks the running profile and uptime", () => {
    let t = 10_000
    const state = new ProxyState(() => t)
    state.setRunning(3)
    t += 4_500
    expect(state.getStatus()).toEqual({ running: true, profileId: 3, startedAt: 10_000, uptimeSec: 4 })
    state.setStopped()
    expect(state.getStatus()).toEqual({ running: false, profileId: null, startedAt: null, uptimeSec: 0 })
  })

  it("keeps notifying when one listener throws", () => {
    const state = new ProxyState()
    const bad = vi.fn(() => {
      throw new Error("boom")
    })
    const good = vi.fn()
    state.subscribe(bad)
    state.subscribe(good)
    state.setRunning(1)
    expect(bad).toHaveBeenCalledTimes(1)
    expect(good).toHaveBeenCalledWith(true, 1)
  })

  it("stops notifying after unsubscribe and skips redundant stops", () => {
    const state = new ProxyState()
    const listener = vi.fn()
    const off = state.subscribe(listener)
    state.setStopped()
    expect(listener).not.toHaveBeenCalled()
    state.setRunning(2)
    off()
    state.setStopped()
    expect(listener).toHaveBeenCalledTimes(1)
  })
})
