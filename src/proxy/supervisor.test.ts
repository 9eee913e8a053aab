import { EventEmitter } from "node:events"
import fs from "node:fs"
import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { PassThrough, Writable } from "node:stream"
import { Response } from "undici"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import type { FetchLike } from "./clash-api.js"
import type { RunConfig } from "./singbox.js"
import { Supervisor, type EngineProcess, type SupervisorOptions, type SupervisorState } from "./supervisor.js"

class FakeEngine extends EventEmitter implements EngineProcess {
  readonly pid: number
  exitCode: number | null = null
  exited = false
  readonly stdout = new PassThrough()
  readonly stderr = new PassThrough()
  readonly signals: NodeJS.Signals[] = []

  constructor(
    pid: number,
    private readonly obeysTerm = true
  ) {
    super()
    this.pid = pid
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal)
    if (signal === "SIGKILL" || this.obeysTerm) setImmediate(() => this.exit(null, signal))
    return true
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return
    this.exited = true
    this.exitCode = code
    this.emit("exit", code, signal)
  }
}

const config: RunConfig = {
  log: { level: "warn", timestamp: true },
  dns: { servers: [{ tag: "local-dns", type: "local" }], rules: [], final: "local-dns" },
  inbounds: [{ type: "mixed", tag: "mixed-in", listen: "127.0.0.1", listen_port: 2080 }],
  outbounds: [{ type: "direct", tag: "direct" }],
  route: { rules: [], final: "direct", auto_detect_interface: false }
}

describe("Supervisor", () => {
  let tmpDir = ""
  let engines: FakeEngine[] = []
  let spawnArgs: string[][] = []
  let aliveAtSpawn: number[] = []

  const liveEngine = () => engines.find((e) => !e.exited)

  const answeringFetch: FetchLike = async () => {
    if (!liveEngine()) throw new Error("connect ECONNREFUSED")
    return new Response(JSON.stringify({ version: "1.10.0" }), { status: 200 })
  }

  function makeSupervisor(overrides: Partial<SupervisorOptions> & { obeysTerm?: boolean } = {}): Supervisor {
    const { obeysTerm = true, ...rest } = overrides
    return new Supervisor({
      binary: "/opt/engine/sing-box",
      apiAddr: "127.0.0.1:19090",
      apiSecret: "test-secret",
      settleMs: 5,
      pollIntervalMs: 5,
      readyTimeoutMs: 200,
      stopTimeoutMs: 50,
      killTimeoutMs: 50,
      tmpDir,
      fetch: answeringFetch,
      spawn: (_cmd, args) => {
        aliveAtSpawn.push(engines.filter((e) => !e.exited).length)
        spawnArgs.push(args)
        const engine = new FakeEngine(1000 + engines.length, obeysTerm)
        engines.push(engine)
        return engine
      },
      ...rest
    })
  }

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), "linkbox-sup-test-"))
    engines = []
    spawnArgs = []
    aliveAtSpawn = []
  })

  afterEach(async () => {
    await fsp.rm(tmpDir, { recursive: true, force: true })
  })

  it("stops successfully without a prior start", async () => {
    const sup = makeSupervisor()
    expect(await sup.stop()).toEqual({ ok: true, message: "not running" })
    expect(sup.state).toBe("stopped")
    expect(engines).toHaveLength(0)
  })

  it("writes a private config with the control API injected", async () => {
    const sup = makeSupervisor()
    const res = await sup.start(config)
    expect(res).toEqual({ ok: true, message: "engine running (pid 1000)" })
    expect(sup.state).toBe("running")
    expect(sup.isRunning).toBe(true)

    const args = spawnArgs[0] ?? []
    expect(args.slice(0, 2)).toEqual(["run", "-c"])
    const cfgPath = args[2] ?? ""
    expect(path.dirname(path.dirname(cfgPath))).toBe(tmpDir)
    const written = JSON.parse(await fsp.readFile(cfgPath, "utf8"))
    expect(written.experimental).toEqual({ clash_api: { external_controller: "127.0.0.1:19090", secret: "test-secret" } })
    expect(written.route).toEqual(config.route)
    expect((await fsp.stat(cfgPath)).mode & 0o777).toBe(0o600)
    expect(config.experimental).toBeUndefined()

    await sup.stop()
    expect(await fsp.readdir(tmpDir)).toEqual([])
  })

  it("uses the single-flag invocation when configured", async () => {
    const sup = makeSupervisor({ args: "config" })
    await sup.start(config)
    expect(spawnArgs[0]?.[0]).toBe("-config")
    await sup.stop()
  })

  it("never runs two engines at once", async () => {
    const sup = makeSupervisor()
    await sup.start(config)
    await sup.start(config)
    expect(aliveAtSpawn).toEqual([0, 0])
    expect(engines[0]?.signals).toEqual(["SIGTERM"])
    expect(engines[1]?.exited).toBe(false)
    await sup.stop()
  })

  it("serializes overlapping starts", async () => {
    const sup = makeSupervisor()
    const [a, b] = await Promise.all([sup.start(config), sup.start(config)])
    expect(a.ok && b.ok).toBe(true)
    expect(aliveAtSpawn).toEqual([0, 0])
    await sup.stop()
  })

  it("reports a missing binary", async () => {
    const sup = makeSupervisor({
      spawn: () => {
        const engine = new FakeEngine(1)
        setImmediate(() => engine.emit("error", Object.assign(new Error("spawn /opt/engine/sing-box ENOENT"), { code: "ENOENT" })))
        return engine
      }
    })
    const res = await sup.start(config)
    expect(res).toEqual({ ok: false, kind: "BinaryNotFound", message: "binary not found: /opt/engine/sing-box" })
    expect(sup.state).toBe("stopped")
    expect(await fsp.readdir(tmpDir)).toEqual([])
  })

  it("surfaces stderr when the engine exits during startup", async () => {
    const sup = makeSupervisor({
      settleMs: 30,
      spawn: () => {
        const engine = new FakeEngine(7)
        engine.stderr.write("FATAL decode config: unknown field\n")
        setTimeout(() => engine.exit(1), 10)
        return engine
      }
    })
    const res = await sup.start(config)
    expect(res).toEqual({
      ok: false,
      kind: "ProcessExitedImmediately",
      message: "engine exited with code 1: FATAL decode config: unknown field"
    })
    expect(sup.state).toBe("stopped")
    expect(await fsp.readdir(tmpDir)).toEqual([])
  })

  it("times out when the control API never answers", async () => {
    const onStop = vi.fn()
    const sup = makeSupervisor({
      readyTimeoutMs: 40,
      fetch: async () => {
        throw new Error("connect ECONNREFUSED")
      }
    })
    sup.setOnStop(onStop)
    const res = await sup.start(config)
    expect(res.ok).toBe(false)
    if (!res.ok) expect(res.kind).toBe("ReadinessTimeout")
    expect(engines[0]?.signals).toEqual(["SIGTERM"])
    expect(sup.state).toBe("stopped")
    expect(onStop).not.toHaveBeenCalled()
    expect(await fsp.readdir(tmpDir)).toEqual([])
  })

  it("closes the engine log when spawning throws", async () => {
    const endSpy = vi.spyOn(Writable.prototype, "end")
    try {
      const sup = makeSupervisor({
        logFile: path.join(tmpDir, "logs", "engine.log"),
        spawn: () => {
          throw new Error("spawn EACCES")
        }
      })
      const res = await sup.start(config)
      expect(res).toEqual({ ok: false, kind: "StartFailed", message: "failed to start engine: spawn EACCES" })
      expect(sup.state).toBe("stopped")
      expect(endSpy.mock.contexts.some((s) => s instanceof fs.WriteStream)).toBe(true)
    } finally {
      endSpy.mockRestore()
    }
  })

  it("escalates to SIGKILL when SIGTERM is ignored", async () => {
    const sup = makeSupervisor({ obeysTerm: false })
    await sup.start(config)
    const res = await sup.stop()
    expect(res).toEqual({ ok: true, kind: "StopTimeout", message: "engine did not exit in time and was killed" })
    expect(engines[0]?.signals).toEqual(["SIGTERM", "SIGKILL"])
    expect(sup.state).toBe("stopped")
  })

  it("fires the on-stop callback once and survives it throwing", async () => {
    const onStop = vi.fn(() => {
      throw new Error("listener broke")
    })
    const sup = makeSupervisor()
    sup.setOnStop(onStop)
    await sup.start(config)
    expect(await sup.stop()).toEqual({ ok: true, message: "engine stopped" })
    expect(await sup.stop()).toEqual({ ok: true, message: "not running" })
    expect(onStop).toHaveBeenCalledTimes(1)
  })

  it("cleans up after the engine dies on its own", async () => {
    const onStop = vi.fn()
    const sup = makeSupervisor()
    sup.setOnStop(onStop)
    await sup.start(config)
    engines[0]?.exit(2)
    await vi.waitFor(() => expect(sup.state).toBe("stopped"))
    expect(onStop).toHaveBeenCalledTimes(1)
    expect(await fsp.readdir(tmpDir)).toEqual([])
  })

  it("reports state transitions in order", async () => {
    const seen: SupervisorState[] = []
    const sup = makeSupervisor()
    sup.onStateChange((s) => seen.push(s))
    await sup.start(config)
    await sup.stop()
    expect(seen).toEqual(["starting", "running", "stopping", "stopped"])
  })

  it("reloads by stopping first", async () => {
    const sup = makeSupervisor()
    await sup.start(config)
    const res = await sup.reload(config)
    expect(res.ok).toBe(true)
    expect(engines).toHaveLength(2)
    expect(engines[0]?.exited).toBe(true)
    await sup.stop()
  })

  it("answers control calls with sentinels while stopped", async () => {
    const sup = makeSupervisor()
    expect(await sup.getTraffic()).toEqual({ upload: 0, download: 0 })
    expect(await sup.getConnections()).toEqual([])
    expect(await sup.closeAllConnections()).toBe(false)
    expect(await sup.testDelay("proxy")).toBe(-1)
    expect(await sup.getVersion()).toBeNull()
  })

  it("forwards control calls while running", async () => {
    const sup = makeSupervisor()
    await sup.start(config)
    expect(await sup.getVersion()).toEqual({ version: "1.10.0" })
    await sup.stop()
  })
})
