import { captureCmd, type CmdResult } from "../utils/exec.js"
import { createLogger, errorMessage } from "../utils/log.js"

const log = createLogger("vpn")

export interface VpnStatusProvider {
  isActive(connectionName: string): Promise<boolean>
  getInterface(connectionName: string): Promise<string | null>
  getDnsServers(connectionName: string): Promise<string[]>
  /** First non-tunnel interface carrying the default route. */
  getDefaultInterface(exclude?: string | null): Promise<string | null>
}

export type CommandRunner = (command: string, args: string[], opts: { timeoutMs: number }) => Promise<CmdResult>

const TUNNEL_PREFIXES = ["tun", "tap"]
const PHYSICAL_PREFIXES = ["eth", "enp", "wlan", "wlp", "ens"]

function linkNames(ipLinkOutput: string): string[] {
  const out: string[] = []
  for (const line of ipLinkOutput.split("\n")) {
    const parts = line.split(":")
    if (parts.length < 2) continue
    const name = (parts[1] ?? "").trim().split("@")[0]?.trim() ?? ""
    if (name) out.push(name)
  }
  return out
}

function startsWithAny(s: string, prefixes: readonly string[]): boolean {
  return prefixes.some((p) => s.startsWith(p))
}

/** Value of a terse `nmcli -t` field line (`FIELD:value`), or "" for `--`. */
function nmcliValue(stdout: string): string {
  let v = stdout.trim()
  const colon = v.indexOf(":")
  if (colon >= 0) v = v.slice(colon + 1)
  v = v.trim()
  return v === "--" ? "" : v
}

/** Queries NetworkManager (`nmcli`) and iproute2 (`ip`). Every failure degrades to false/null/[]. */
export class NmcliVpnStatus implements VpnStatusProvider {
  constructor(
    private readonly run: CommandRunner = captureCmd,
    private readonly timeoutMs = 5000
  ) {}

  private async exec(command: string, args: string[]): Promise<string | null> {
    try {
      const res = await this.run(command, args, { timeoutMs: this.timeoutMs })
      if (res.code !== 0) {
        log.debug(`${command} ${args.join(" ")} exited ${res.code}: ${res.stderr.trim()}`)
        return null
      }
      return res.stdout
    } catch (e) {
      log.warn(`${command} unavailable: ${errorMessage(e)}`)
      return null
    }
  }

  async listConnections(): Promise<string[]> {
    const out = await this.exec("nmcli", ["-t", "-f", "NAME,TYPE", "connection", "show"])
    if (out == null) return []
    const names: string[] = []
    for (const line of out.split("\n")) {
      const [name = "", type = ""] = line.split(":")
      if (name && ["vpn", "wireguard", "tun"].includes(type)) names.push(name)
    }
    return names
  }

  async isActive(connectionName: string): Promise<boolean> {
    if (!connectionName) return false
    const out = await this.exec("nmcli", ["-t", "-f", "NAME", "connection", "show", "--active"])
    if (out == null) return false
    return out.trim().split("\n").includes(connectionName)
  }

  async getInterface(connectionName: string): Promise<string | null> {
    if (!(await this.isActive(connectionName))) return null

    const general = await this.exec("nmcli", ["-t", "-f", "GENERAL.DEVICE", "connection", "show", connectionName])
    const fromGeneral = general == null ? "" : nmcliValue(general)
    if (fromGeneral) return fromGeneral

    const active = await this.exec("nmcli", ["-t", "-f", "DEVICE", "connection", "show", "--active", connectionName])
    const fromActive = active == null ? "" : nmcliValue(active)
    if (fromActive) return fromActive

    const links = await this.exec("ip", ["-o", "link", "show"])
    if (links == null) return null
    return linkNames(links).find((n) => startsWithAny(n, TUNNEL_PREFIXES)) ?? null
  }

  async getDnsServers(connectionName: string): Promise<string[]> {
    if (!connectionName) return []
    const split = (line: string) => line.replace(/,/g, " ").split(/\s+/).filter(Boolean)

    if (await this.isActive(connectionName)) {
      const out = await this.exec("nmcli", ["-t", "-f", "ipv4.dns", "connection", "show", "--active", connectionName])
      const servers = out == null ? [] : split(nmcliValue(out))
      if (servers.length) return servers
    }
    const out = await this.exec("nmcli", ["-t", "-f", "ipv4.dns", "connection", "show", connectionName])
    return out == null ? [] : split(nmcliValue(out))
  }

  async getDefaultInterface(exclude: string | null = null): Promise<string | null> {
    const usable = (name: string) => name !== "lo" && name !== exclude && !startsWithAny(name, TUNNEL_PREFIXES)

    const routes = await this.exec("ip", ["route", "show", "default"])
    for (const line of (routes ?? "").split("\n")) {
      if (!line.startsWith("default")) continue
      const parts = line.trim().split(/\s+/)
      const i = parts.indexOf("dev")
      const name = i >= 0 ? parts[i + 1] : undefined
      if (name && usable(name)) return name
    }

    const links = await this.exec("ip", ["-o", "link", "show", "up"])
    if (links == null) return null
    return linkNames(links).find((n) => usable(n) && startsWithAny(n, PHYSICAL_PREFIXES)) ?? null
  }
}
