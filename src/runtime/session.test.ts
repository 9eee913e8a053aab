import { describe, expect, it } from "vitest"
import type { ProxyProfile } from "../profile/types.js"
import { createProfile } from "../profile/types.js"
import type { RunConfig } from "../proxy/singbox.js"
import type { SupervisorResult } from "../proxy/supervisor.js"
import type { VpnStatusProvider } from "../proxy/vpn.js"
import { defaultSettings } from "../settings/settings.js"
import { buildConfigFor, ProxySession, type SessionEngine } from "./session.js"
import { ProxyState } from "./state.js"

const noVpn: VpnStatusProvider = {
  isActive: async () => false,
  getInterface: async () => null,
  getDnsServers: async () => [],
  getDefaultInterface: async () => null
}

class FakeEngine implements SessionEngine {
  configs: RunConfig[] = []
  stops = 0
  onStop: (() => void) | null = null
  nextStart: SupervisorResult = { ok: true, message: "engine running (pid 1)" }

  async start(config: RunConfig): Promise<SupervisorResult> {
    this.configs.push(config)
    return this.nextStart
  }
  async stop(): Promise<SupervisorResult> {
    this.stops++
    this.onStop?.()
    return { ok: true, message: "engine stopped" }
  }
  setOnStop(cb: (() => void) | null): void {
    this.onStop = cb
  }
}

function socks(): ProxyProfile {
  const p = createProfile("socks")
  p.name = "home"
  p.serverAddress = "10.0.0.5"
  p.serverPort = 1080
  return p
}

const ctx = () => ({ settings: defaultSettings(), vpnStatus: noVpn, listsDir: "/nonexistent" })

describe("buildConfigFor", () => {
  it("applies profile overrides over the global settings", async () => {
    const built = await buildConfigFor(socks(), ctx(), { routing: { mode: "proxy-all" } })
    expect(built.ok).toBe(true)
    if (!built.ok) return
    expect(built.config.route.rules).toEqual([])
    expect(built.config.route.final).toBe("home")
  })

  it("reports compile errors", async () => {
    const p = socks()
    p.serverAddress = ""
    expect(await buildConfigFor(p, ctx())).toEqual({ ok: false, error: "socks profile has no server address" })
  })
})

describe("ProxySession", () => {
  it("marks the profile running only after a successful start", async () => {
    const engine = new FakeEngine()
    const state = new ProxyState()
    const session = new ProxySession(engine, state, ctx())
    engine.nextStart = { ok: false, kind: "ReadinessTimeout", message: "engine did not become ready" }
    expect((await session.start({ id: 4, profile: socks() })).ok).toBe(false)
    expect(state.isRunning).toBe(false)

    engine.nextStart = { ok: true, message: "engine running (pid 1)" }
    await session.start({ id: 4, profile: socks() })
    expect(state.currentProfileId).toBe(4)
  })

  it("stops the previous profile before switching", async () => {
    const engine = new FakeEngine()
    const state = new ProxyState()
    const session = new ProxySession(engine, state, ctx())
    await session.start({ id: 1, profile: socks() })
    await session.start({ id: 2, profile: socks() })
    expect(engine.stops).toBe(1)
    expect(state.currentProfileId).toBe(2)
  })

  it("follows the engine when it stops on its own", async () => {
    const engine = new FakeEngine()
    const state = new ProxyState()
    const session = new ProxySession(engine, state, ctx())
    await session.start({ id: 1, profile: socks() })
    engine.onStop?.()
    expect(state.isRunning).toBe(false)
  })

  it("does not start the engine for a profile that cannot compile", async () => {
    const engine = new FakeEngine()
    const session = new ProxySession(engine, new ProxyState(), ctx())
    const p = socks()
    p.serverPort = 0
    const result = await session.start({ id: 1, profile: p })
    expect(result).toEqual({ ok: false, kind: "StartFailed", message: "socks profile has invalid port 0" })
    expect(engine.configs).toHaveLength(0)
  })
})
