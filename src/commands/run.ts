import { createSupervisor, loadAppContext, type AppContext } from "../app.js"
import { parseLink } from "../link/index.js"
import { DEFAULT_PROXY_TAG } from "../proxy/route.js"
import { ConnectionMonitor } from "../runtime/monitor.js"
import { ProxySession } from "../runtime/session.js"
import { ProxyState } from "../runtime/state.js"
import { c, createLogger, fmtKv } from "../utils/log.js"
import { parseArgs } from "./args.js"
import { parsePort, parseProfileId } from "./format.js"

const log = createLogger("cli")

/** Id used in `ProxyState` for a profile that came straight from a link. */
const AD_HOC_PROFILE_ID = -1

export interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown
  off(event: NodeJS.Signals, listener: () => void): unknown
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]

/** Resolves on the first SIGINT/SIGTERM or when the proxy stops; both listeners are removed either way. */
export function waitForShutdown(state: ProxyState, signals: SignalSource = process): Promise<"signal" | "engine"> {
  return new Promise((resolve) => {
    const finish = (reason: "signal" | "engine") => {
      for (const sig of SHUTDOWN_SIGNALS) signals.off(sig, onSignal)
      unsubscribe()
      resolve(reason)
    }
    const onSignal = () => finish("signal")
    for (const sig of SHUTDOWN_SIGNALS) signals.once(sig, onSignal)
    const unsubscribe = state.subscribe((running) => {
      if (!running) finish("engine")
    })
  })
}

/** Runs the engine in the foreground until SIGINT/SIGTERM or until it dies. */
export async function cmdRun(argv: string[], ctx?: AppContext) {
  const [target = "", portArg] = parseArgs(argv).positional
  if (!target) throw new Error("usage: linkbox run <link|id> [port]")
  const app = ctx ?? (await loadAppContext())
  const port = parsePort(portArg)
  if (port != null) app.settings.inbound.port = port

  const id = parseProfileId(target)
  const stored = id != null ? app.store.getProfile(id) : undefined
  if (id != null && !stored) throw new Error(`no profile with id ${id}`)
  const profile = stored?.profile ?? parseLink(target)
  if (!profile) throw new Error("not a supported share link")

  log.debug(
    fmtKv({
      profile: stored?.id,
      mode: app.settings.routing.mode,
      vpn: app.settings.vpn.enabled ? app.settings.vpn.connectionName || "auto" : "",
      dns: app.settings.dns.customUrl || app.settings.dns.provider
    })
  )
  const supervisor = createSupervisor(app.settings)
  const state = new ProxyState()
  const session = new ProxySession(supervisor, state, app)
  const monitor = new ConnectionMonitor({
    engine: supervisor,
    proxyState: state,
    vpnStatus: app.vpnStatus,
    settings: () => app.settings
  })
  monitor.onStatusChanged((_prev, cur) => {
    const proxy = cur.proxyOk ? c.green("ok") : c.red(cur.proxyError || "down")
    const vpn = cur.vpnOk ? c.green("ok") : c.red(cur.vpnError || "down")
    log.info(`status: proxy ${proxy}, vpn ${vpn}`)
  })

  const result = await session.start({ id: stored?.id ?? AD_HOC_PROFILE_ID, profile, overrides: stored?.overrides })
  if (!result.ok) throw new Error(`${result.kind}: ${result.message}`)
  log.info(`${result.message}, mixed proxy on ${app.settings.inbound.listen}:${app.settings.inbound.port}`)
  const tag = profile.name || DEFAULT_PROXY_TAG
  const delay = await supervisor.testDelay(tag, app.settings.monitoring.testUrl)
  log.info(delay >= 0 ? `latency via ${tag}: ${delay}ms` : `latency test via ${tag} failed`)
  if (stored) {
    app.store.markUsed(stored.id)
    app.store.setLatency(stored.id, delay)
    await app.store.save()
  }
  await monitor.start()

  const reason = await waitForShutdown(state)

  monitor.stop()
  if (reason === "signal") {
    const stopped = await session.stop()
    log.info(stopped.message)
  } else {
    process.exitCode = 1
    log.error("engine exited")
  }
}
