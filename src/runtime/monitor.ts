import type { VpnStatusProvider } from "../proxy/vpn.js"
import type { MonitoringSettings, VpnSettings } from "../settings/settings.schema.js"
import { createLogger, errorMessage } from "../utils/log.js"
import type { ProxyState } from "./state.js"

const log = createLogger("monitor")

export interface ConnectionStatus {
  readonly proxyOk: boolean
  readonly vpnOk: boolean
  /** Epoch ms of the check; 0 before the first one. */
  readonly checkedAt: number
  readonly proxyError: string
  readonly vpnError: string
}

export type StatusListener = (previous: ConnectionStatus, current: ConnectionStatus) => void

export interface EngineProbe {
  readonly isRunning: boolean
  getVersion(): Promise<unknown>
}

export interface MonitorDeps {
  engine: EngineProbe
  proxyState: Pick<ProxyState, "isRunning">
  vpnStatus: VpnStatusProvider
  settings: () => { monitoring: MonitoringSettings; vpn: VpnSettings }
  now?: () => number
}

const INITIAL: ConnectionStatus = Object.freeze({ proxyOk: false, vpnOk: false, checkedAt: 0, proxyError: "", vpnError: "" })

type CheckOutcome = { ok: boolean; error: string }

export class ConnectionMonitor {
  private timer: NodeJS.Timeout | null = null
  private status: ConnectionStatus = INITIAL
  private inFlight: Promise<ConnectionStatus> | null = null
  /** Bumped by stop() so checks started earlier can tell they are stale. */
  private generation = 0
  private readonly listeners: StatusListener[] = []
  private readonly now: () => number

  constructor(private readonly deps: MonitorDeps) {
    this.now = deps.now ?? Date.now
  }

  get current(): ConnectionStatus {
    return this.status
  }

  get isStarted(): boolean {
    return this.timer != null
  }

  onStatusChanged(listener: StatusListener): () => void {
    this.listeners.push(listener)
    return () => {
      const i = this.listeners.indexOf(listener)
      if (i >= 0) this.listeners.splice(i, 1)
    }
  }

  /** Runs one check right away, then every `intervalSec`. No-op when disabled or already started. */
  async start(): Promise<void> {
    if (this.timer) return
    const { monitoring } = this.deps.settings()
    if (!monitoring.enabled) {
      log.info("monitoring disabled, not starting")
      return
    }
    log.info(`monitoring every ${monitoring.intervalSec}s`)
    this.timer = setInterval(() => {
      this.tick().catch((e: unknown) => log.error(`check failed: ${errorMessage(e)}`))
    }, monitoring.intervalSec * 1000)
    await this.runCheck(false)
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
    this.generation++
    this.status = INITIAL
    log.info("monitoring stopped")
  }

  /** Checks once, even when monitoring is disabled, and always notifies. */
  async checkNow(): Promise<ConnectionStatus> {
    return await this.runCheck(true)
  }

  private async tick(): Promise<void> {
    if (!this.deps.settings().monitoring.enabled) {
      this.stop()
      return
    }
    await this.runCheck(false)
  }

  private runCheck(force: boolean): Promise<ConnectionStatus> {
    if (this.inFlight) {
      // A check is already running; a manual request still gets its notification.
      return force
        ? this.inFlight.then((s) => {
            this.notify(s, s)
            return s
          })
        : this.inFlight
    }
    this.inFlight = this.check(force).finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  private async check(force: boolean): Promise<ConnectionStatus> {
    const generation = this.generation
    const proxy = await this.checkProxy()
    const vpn = await this.checkVpn()
    const current: ConnectionStatus = Object.freeze({
      proxyOk: proxy.ok,
      vpnOk: vpn.ok,
      checkedAt: this.now(),
      proxyError: proxy.error,
      vpnError: vpn.error
    })
    // Results of a periodic check that outlived stop() are dropped.
    if (!force && generation !== this.generation) return current
    const previous = this.status
    this.status = current
    log.debug(`proxy=${proxy.ok ? "ok" : proxy.error} vpn=${vpn.ok ? "ok" : vpn.error}`)
    if (force || previous.proxyOk !== current.proxyOk || previous.vpnOk !== current.vpnOk) {
      this.notify(previous, current)
    }
    return current
  }

  private async checkProxy(): Promise<CheckOutcome> {
    if (!this.deps.proxyState.isRunning) return { ok: false, error: "proxy is not running" }
    if (!this.deps.engine.isRunning) return { ok: false, error: "engine process is not running" }
    try {
      const version = await this.deps.engine.getVersion()
      if (version == null) return { ok: false, error: "control API is not responding" }
    } catch (e) {
      return { ok: false, error: `control API check failed: ${errorMessage(e)}` }
    }
    return { ok: true, error: "" }
  }

  private async checkVpn(): Promise<CheckOutcome> {
    const { vpn } = this.deps.settings()
    if (!vpn.enabled || !vpn.connectionName) return { ok: true, error: "" }
    try {
      if (await this.deps.vpnStatus.isActive(vpn.connectionName)) return { ok: true, error: "" }
      return { ok: false, error: `VPN '${vpn.connectionName}' is not active` }
    } catch (e) {
      return { ok: false, error: `VPN check failed: ${errorMessage(e)}` }
    }
  }

  private notify(previous: ConnectionStatus, current: ConnectionStatus): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(previous, current)
      } catch (e) {
        log.error(`status listener failed: ${errorMessage(e)}`)
      }
    }
  }
}
