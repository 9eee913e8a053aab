import fs from "node:fs"
import path from "node:path"
import type { CoreArgStyle } from "../settings/settings.schema.js"

export const CORE_BINARY_NAME = "sing-box"

function isWin(): boolean {
  return process.platform === "win32"
}

function isExecutableFile(p: string): boolean {
  try {
    if (!fs.statSync(p).isFile()) return false
    if (!isWin()) fs.accessSync(p, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

export interface FindCoreOptions {
  bundledDir?: string
  pathEnv?: string
  isExecutable?: (p: string) => boolean
}

/** Looks in the bundled dir first, then each PATH entry. */
export function findCoreBinary(name = CORE_BINARY_NAME, opts: FindCoreOptions = {}): string | null {
  const { bundledDir, pathEnv = process.env.PATH ?? "", isExecutable = isExecutableFile } = opts
  const exe = isWin() && !name.endsWith(".exe") ? `${name}.exe` : name
  const dirs = [...(bundledDir ? [bundledDir] : []), ...pathEnv.split(path.delimiter).filter(Boolean)]
  for (const dir of dirs) {
    const candidate = path.join(dir, exe)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

/** `sing-box run -c <file>` or the single-flag `-config <file>` form. */
export function coreArgs(style: CoreArgStyle, configPath: string): string[] {
  return style === "config" ? ["-config", configPath] : ["run", "-c", configPath]
}
