import os from "node:os"
import path from "node:path"
import { fileURLToPath } from "node:url"

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export const projectRoot = path.resolve(__dirname, "..")

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = String(env.LINKBOX_CONFIG_DIR ?? "").trim()
  return override ? path.resolve(override) : path.join(os.homedir(), ".config", "linkbox")
}

export const paths = {
  /** A `sing-box` binary shipped next to the project wins over PATH. */
  bundledCoreDir: path.join(projectRoot, "core", "bin"),
  exampleConfig: path.join(projectRoot, "config", "config.example.yaml"),
  settingsFile: (env?: NodeJS.ProcessEnv) => path.join(configDir(env), "config.yaml"),
  profilesFile: (env?: NodeJS.ProcessEnv) => path.join(configDir(env), "profiles.json"),
  /** Routing list files are resolved relative to this directory. */
  listsDir: (env?: NodeJS.ProcessEnv) => configDir(env),
  subscriptionCacheDir: (env?: NodeJS.ProcessEnv) => path.join(configDir(env), "subscription-cache")
}
