import { paths } from "./config.js"
import { ProfileStore } from "./profile/store.js"
import { Supervisor } from "./proxy/supervisor.js"
import { NmcliVpnStatus, type VpnStatusProvider } from "./proxy/vpn.js"
import { loadSettings } from "./settings/settings.js"
import type { Settings } from "./settings/settings.schema.js"

/** Everything a command needs, built once per invocation and passed down. */
export interface AppContext {
  env: NodeJS.ProcessEnv
  settings: Settings
  store: ProfileStore
  vpnStatus: VpnStatusProvider
  listsDir: string
}

export async function loadAppContext(env: NodeJS.ProcessEnv = process.env): Promise<AppContext> {
  const settings = await loadSettings(paths.settingsFile(env), env)
  if (!settings.subscription.cacheDir) settings.subscription.cacheDir = paths.subscriptionCacheDir(env)
  const store = new ProfileStore(paths.profilesFile(env))
  await store.load()
  return { env, settings, store, vpnStatus: new NmcliVpnStatus(), listsDir: paths.listsDir(env) }
}

export function createSupervisor(settings: Settings): Supervisor {
  const { core } = settings
  return new Supervisor({
    ...(core.binary ? { binary: core.binary } : {}),
    ...(core.logFile ? { logFile: core.logFile } : {}),
    bundledDir: paths.bundledCoreDir,
    args: core.args,
    apiAddr: core.apiAddr,
    apiSecret: core.apiSecret,
    settleMs: core.settleMs,
    readyTimeoutMs: core.readyTimeoutMs,
    stopTimeoutMs: core.stopTimeoutMs
  })
}
