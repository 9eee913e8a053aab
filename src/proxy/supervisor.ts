import { spawn, type SpawnOptions } from "node:child_process"
import fs from "node:fs"
import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import readline from "node:readline"
import type { Readable } from "node:stream"
import type { CoreArgStyle } from "../settings/settings.schema.js"
import { ensureDir, isErrno, sleep } from "../utils/fs.js"
import { createLogger, errorMessage } from "../utils/log.js"
import { ClashApiClient, type Connection, type EngineVersion, type FetchLike, type LogStream, type TrafficStats } from "./clash-api.js"
import { coreArgs, findCoreBinary } from "./core.js"
import type { RunConfig } from "./singbox.js"

const log = createLogger("core")

export type SupervisorState = "stopped" | "starting" | "running" | "stopping"

export type SupervisorFailureKind =
  | "BinaryNotFound"
  | "ConfigWriteFailed"
  | "ProcessExitedImmediately"
  | "ReadinessTimeout"
  | "StopTimeout"
  | "StartFailed"

export type SupervisorResult =
  | { ok: true; message: string; kind?: "StopTimeout" }
  | { ok: false; kind: SupervisorFailureKind; message: string }

/** The parts of a child process the supervisor relies on. */
export interface EngineProcess {
  readonly pid?: number | undefined
  readonly exitCode: number | null
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals): boolean
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
  once(event: "error", listener: (err: Error) => void): unknown
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => EngineProcess

export type StateListener = (state: SupervisorState, previous: SupervisorState) => void

export interface SupervisorOptions {
  /** Explicit engine path; otherwise `findCoreBinary` runs on each start. */
  binary?: string
  bundledDir?: string
  args?: CoreArgStyle
  apiAddr?: string
  apiSecret?: string
  logFile?: string
  settleMs?: number
  readyTimeoutMs?: number
  pollIntervalMs?: number
  stopTimeoutMs?: number
  killTimeoutMs?: number
  spawn?: SpawnFn
  fetch?: FetchLike
  tmpDir?: string
}

const STDERR_TAIL = 50

interface EngineRun {
  proc: EngineProcess
  configDir: string
  exited: boolean
  exitCode: number | null
  spawnError: Error | null
  stderrTail: string[]
  exitPromise: Promise<void>
  logStream: fs.WriteStream | null
}

function defaultSpawn(command: string, args: string[], options: SpawnOptions): EngineProcess {
  return spawn(command, args, options)
}

function withControlApi(config: RunConfig, addr: string, secret: string): RunConfig {
  return {
    ...config,
    experimental: { ...config.experimental, clash_api: { external_controller: addr, secret } }
  }
}

/**
 * Owns one engine process and its temp config. `start`/`stop`/`reload` are
 * serialized, so at most one child is ever alive.
 */
export class Supervisor {
  readonly api: ClashApiClient
  private readonly probe: ClashApiClient
  private readonly opts: Required<Omit<SupervisorOptions, "binary" | "bundledDir" | "logFile" | "fetch" | "tmpDir">> &
    Pick<SupervisorOptions, "binary" | "bundledDir" | "logFile" | "tmpDir">
  private run: EngineRun | null = null
  private _state: SupervisorState = "stopped"
  private queue: Promise<unknown> = Promise.resolve()
  private readonly stateListeners = new Set<StateListener>()
  private onStop: (() => void) | null = null

  constructor(options: SupervisorOptions = {}) {
    this.opts = {
      binary: options.binary,
      bundledDir: options.bundledDir,
      logFile: options.logFile,
      tmpDir: options.tmpDir,
      args: options.args ?? "run-c",
      apiAddr: options.apiAddr ?? "127.0.0.1:9090",
      apiSecret: options.apiSecret ?? "",
      settleMs: options.settleMs ?? 500,
      readyTimeoutMs: options.readyTimeoutMs ?? 5000,
      pollIntervalMs: options.pollIntervalMs ?? 200,
      stopTimeoutMs: options.stopTimeoutMs ?? 5000,
      killTimeoutMs: options.killTimeoutMs ?? 2000,
      spawn: options.spawn ?? defaultSpawn
    }
    this.api = new ClashApiClient({ addr: this.opts.apiAddr, secret: this.opts.apiSecret, fetch: options.fetch })
    this.probe = new ClashApiClient({
      addr: this.opts.apiAddr,
      secret: this.opts.apiSecret,
      fetch: options.fetch,
      timeoutMs: 1000
    })
  }

  get state(): SupervisorState {
    return this._state
  }

  get isRunning(): boolean {
    return this._state === "running" && this.run != null && !this.run.exited
  }

  get pid(): number | null {
    return this.run?.proc.pid ?? null
  }

  /** Called once each time a running engine stops, whether asked to or not. */
  setOnStop(cb: (() => void) | null): void {
    this.onStop = cb
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener)
    return () => this.stateListeners.delete(listener)
  }

  private setState(next: SupervisorState): void {
    const prev = this._state
    if (prev === next) return
    this._state = next
    for (const listener of this.stateListeners) {
      try {
        listener(next, prev)
      } catch (e) {
        log.error(`state listener failed: ${errorMessage(e)}`)
      }
    }
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn, fn)
    this.queue = next.catch(() => undefined)
    return next
  }

  start(config: RunConfig): Promise<SupervisorResult> {
    return this.serialize(() => this.doStart(config))
  }

  stop(): Promise<SupervisorResult> {
    return this.serialize(() => this.doStop())
  }

  /** Stop, then start with the new config. */
  reload(config: RunConfig): Promise<SupervisorResult> {
    return this.serialize(async () => {
      const stopped = await this.doStop()
      if (!stopped.ok) log.warn(`reload: stop failed: ${stopped.message}`)
      return await this.doStart(config)
    })
  }

  private resolveBinary(): string | null {
    if (this.opts.binary) return this.opts.binary
    return findCoreBinary(undefined, { bundledDir: this.opts.bundledDir })
  }

  private async doStart(config: RunConfig): Promise<SupervisorResult> {
    if (this.run) await this.doStop()
    this.setState("starting")

    const binary = this.resolveBinary()
    if (!binary) {
      this.setState("stopped")
      return { ok: false, kind: "BinaryNotFound", message: "sing-box not found in the bundled dir or PATH" }
    }

    let configDir = ""
    let configPath = ""
    try {
      configDir = await fsp.mkdtemp(path.join(this.opts.tmpDir ?? os.tmpdir(), "linkbox-"))
      configPath = path.join(configDir, "config.json")
      const body = JSON.stringify(withControlApi(config, this.opts.apiAddr, this.opts.apiSecret), null, 2)
      await fsp.writeFile(configPath, body, { encoding: "utf8", mode: 0o600 })
    } catch (e) {
      if (configDir) await this.removeConfigDir(configDir)
      this.setState("stopped")
      return { ok: false, kind: "ConfigWriteFailed", message: `failed to write engine config: ${errorMessage(e)}` }
    }

    let run: EngineRun
    try {
      run = await this.spawnEngine(binary, configPath, configDir)
    } catch (e) {
      await this.removeConfigDir(configDir)
      this.setState("stopped")
      return { ok: false, kind: "StartFailed", message: `failed to start engine: ${errorMessage(e)}` }
    }
    this.run = run

    await sleep(this.opts.settleMs)
    const early = this.earlyFailure(run, binary)
    if (early) {
      await this.cleanup(run)
      this.setState("stopped")
      return early
    }

    const deadline = Date.now() + this.opts.readyTimeoutMs
    let version: EngineVersion | null = null
    while (Date.now() < deadline) {
      version = await this.probe.getVersion()
      if (version) break
      const failed = this.earlyFailure(run, binary)
      if (failed) {
        await this.cleanup(run)
        this.setState("stopped")
        return failed
      }
      await sleep(this.opts.pollIntervalMs)
    }

    if (!version) {
      await this.terminate(run)
      await this.cleanup(run)
      this.setState("stopped")
      return {
        ok: false,
        kind: "ReadinessTimeout",
        message: `control API at ${this.api.baseUrl} did not answer within ${this.opts.readyTimeoutMs}ms`
      }
    }

    this.setState("running")
    log.info(`engine running, pid=${run.proc.pid ?? "?"} version=${version.version || "unknown"}`)
    return { ok: true, message: `engine running (pid ${run.proc.pid ?? "?"})` }
  }

  private earlyFailure(run: EngineRun, binary: string): SupervisorResult | null {
    if (run.spawnError) {
      if (isErrno(run.spawnError) && run.spawnError.code === "ENOENT") {
        return { ok: false, kind: "BinaryNotFound", message: `binary not found: ${binary}` }
      }
      return { ok: false, kind: "StartFailed", message: `failed to start engine: ${run.spawnError.message}` }
    }
    if (run.exited) {
      const detail = run.stderrTail.slice(-10).join("\n") || (this.opts.logFile ? `see ${this.opts.logFile}` : "no output")
      return {
        ok: false,
        kind: "ProcessExitedImmediately",
        message: `engine exited with code ${run.exitCode ?? "?"}: ${detail}`
      }
    }
    return null
  }

  private async openLogFile(): Promise<fs.WriteStream | null> {
    const file = this.opts.logFile
    if (!file) return null
    try {
      await ensureDir(path.dirname(file))
      const stream = fs.createWriteStream(file, { flags: "a" })
      stream.on("error", (e) => log.warn(`engine log file ${file}: ${errorMessage(e)}`))
      return stream
    } catch (e) {
      log.warn(`cannot open engine log file ${file}: ${errorMessage(e)}`)
      return null
    }
  }

  private async spawnEngine(binary: string, configPath: string, configDir: string): Promise<EngineRun> {
    const logStream = await this.openLogFile()
    const args = coreArgs(this.opts.args, configPath)
    log.debug(`spawn ${binary} ${args.join(" ")}`)
    let proc: EngineProcess
    try {
      proc = this.opts.spawn(binary, args, {
        cwd: path.dirname(binary) || undefined,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true
      })
    } catch (e) {
      logStream?.end()
      throw e
    }

    let markDone: () => void = () => undefined
    const run: EngineRun = {
      proc,
      configDir,
      exited: false,
      exitCode: null,
      spawnError: null,
      stderrTail: [],
      exitPromise: new Promise<void>((resolve) => {
        markDone = resolve
      }),
      logStream
    }

    proc.once("error", (err) => {
      run.spawnError = err
      run.exited = true
      markDone()
    })
    proc.once("exit", (code) => {
      run.exited = true
      run.exitCode = code
      markDone()
      this.onEngineExit(run)
    })
    this.pipeOutput(run, proc.stdout, false)
    this.pipeOutput(run, proc.stderr, true)
    return run
  }

  private pipeOutput(run: EngineRun, stream: Readable | null, isStderr: boolean): void {
    if (!stream) return
    const rl = readline.createInterface({ input: stream })
    rl.on("line", (line) => {
      log.debug(line)
      run.logStream?.write(`${line}\n`)
      if (isStderr) {
        run.stderrTail.push(line)
        if (run.stderrTail.length > STDERR_TAIL) run.stderrTail.shift()
      }
    })
  }

  private onEngineExit(run: EngineRun): void {
    if (this.run !== run || this._state !== "running") return
    log.warn(`engine exited unexpectedly with code ${run.exitCode ?? "?"}`)
    this.serialize(async () => {
      if (this.run !== run) return
      await this.cleanup(run)
      this.setState("stopped")
      this.fireOnStop()
    }).catch((e) => log.error(`cleanup after engine exit failed: ${errorMessage(e)}`))
  }

  /** SIGTERM, then SIGKILL once the grace period runs out. Resolves true when escalated. */
  private async terminate(run: EngineRun): Promise<boolean> {
    if (run.exited) return false
    run.proc.kill("SIGTERM")
    if (await this.waitForExit(run, this.opts.stopTimeoutMs)) return false
    log.warn(`engine ignored SIGTERM for ${this.opts.stopTimeoutMs}ms, killing`)
    run.proc.kill("SIGKILL")
    if (!(await this.waitForExit(run, this.opts.killTimeoutMs))) log.error("engine did not exit after SIGKILL")
    return true
  }

  private async waitForExit(run: EngineRun, ms: number): Promise<boolean> {
    if (run.exited) return true
    let tid: NodeJS.Timeout | undefined
    const timedOut = new Promise<boolean>((resolve) => {
      tid = setTimeout(() => resolve(false), ms)
    })
    const exited = await Promise.race([run.exitPromise.then(() => true), timedOut])
    clearTimeout(tid)
    return exited
  }

  private async doStop(): Promise<SupervisorResult> {
    const run = this.run
    if (!run) return { ok: true, message: "not running" }
    const wasRunning = this._state === "running"
    this.setState("stopping")
    let escalated = false
    try {
      escalated = await this.terminate(run)
    } catch (e) {
      log.warn(`error stopping engine: ${errorMessage(e)}`)
    }
    await this.cleanup(run)
    this.setState("stopped")
    log.info("engine stopped")
    if (wasRunning) this.fireOnStop()
    return escalated
      ? { ok: true, kind: "StopTimeout", message: "engine did not exit in time and was killed" }
      : { ok: true, message: "engine stopped" }
  }

  private fireOnStop(): void {
    const cb = this.onStop
    if (!cb) return
    try {
      cb()
    } catch (e) {
      log.warn(`on-stop callback failed: ${errorMessage(e)}`)
    }
  }

  private async removeConfigDir(dir: string): Promise<void> {
    try {
      await fsp.rm(dir, { recursive: true, force: true })
    } catch (e) {
      log.debug(`could not remove ${dir}: ${errorMessage(e)}`)
    }
  }

  private async cleanup(run: EngineRun): Promise<void> {
    if (this.run === run) this.run = null
    run.logStream?.end()
    run.logStream = null
    await this.removeConfigDir(run.configDir)
  }

  // Control API, answered only while the engine is running.

  private async whenRunning<T>(fallback: T, fn: (api: ClashApiClient) => Promise<T>): Promise<T> {
    if (!this.isRunning) return fallback
    return await fn(this.api)
  }

  getVersion(): Promise<EngineVersion | null> {
    return this.whenRunning<EngineVersion | null>(null, (api) => api.getVersion())
  }

  getTraffic(): Promise<TrafficStats> {
    return this.whenRunning({ upload: 0, download: 0 }, (api) => api.getTraffic())
  }

  getConnections(): Promise<Connection[]> {
    return this.whenRunning<Connection[]>([], (api) => api.getConnections())
  }

  closeConnection(id: string): Promise<boolean> {
    return this.whenRunning(false, (api) => api.closeConnection(id))
  }

  closeAllConnections(): Promise<boolean> {
    return this.whenRunning(false, (api) => api.closeAllConnections())
  }

  getProxies(): Promise<Record<string, unknown>> {
    return this.whenRunning<Record<string, unknown>>({}, (api) => api.getProxies())
  }

  getConfig(): Promise<Record<string, unknown>> {
    return this.whenRunning<Record<string, unknown>>({}, (api) => api.getConfig())
  }

  testDelay(proxyName: string, url?: string, timeoutMs?: number): Promise<number> {
    return this.whenRunning(-1, (api) => api.testDelay(proxyName, url, timeoutMs))
  }

  openLogStream(level?: string): Promise<LogStream | null> {
    return this.whenRunning<LogStream | null>(null, (api) => api.openLogStream(level))
  }
}
