import fsp from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { paths } from "../config.js"
import { applyEnvOverrides, defaultSettings, loadSettings, parseSettings, toBool, toInt, withOverrides } from "./settings.js"

describe("settings", () => {
  let dir = ""

  afterEach(async () => {
    if (dir) await fsp.rm(dir, { recursive: true, force: true })
    dir = ""
  })

  it("fills every group with defaults", () => {
    const s = defaultSettings()
    expect(s.inbound).toEqual({ listen: "127.0.0.1", port: 2080, sniff: true })
    expect(s.routing.mode).toBe("bypass-local")
    expect(s.routing.ruleOrder).toEqual(["direct", "vpn", "proxy"])
    expect(s.dns).toEqual({ provider: "system", customUrl: "", useProxy: true })
    expect(s.core.args).toBe("run-c")
    expect(s.skipCert).toBe(false)
  })

  it("merges partial yaml with defaults", () => {
    const s = parseSettings("inbound:\n  port: 7890\nvpn:\n  enabled: true\n  overVpnNetworks: [10.8.0.0/16]\n")
    expect(s.inbound.port).toBe(7890)
    expect(s.inbound.listen).toBe("127.0.0.1")
    expect(s.vpn.enabled).toBe(true)
    expect(s.vpn.overVpnNetworks).toEqual(["10.8.0.0/16"])
    expect(s.vpn.overVpnDomains).toEqual([])
  })

  it("rejects values of the wrong type", () => {
    expect(() => parseSettings("inbound:\n  port: http\n")).toThrow(/inbound\.port/)
    expect(() => parseSettings("routing:\n  mode: sideways\n")).toThrow(/routing\.mode/)
  })

  it("rejects a DNS URL with no host", () => {
    expect(() => parseSettings('dns:\n  customUrl: "https://"\n')).toThrow("dns.customUrl: not a usable DNS server URL")
    expect(() => parseSettings('dns:\n  customUrl: "tls://"\n')).toThrow(/dns\.customUrl/)
    expect(parseSettings('dns:\n  customUrl: "tls://9.9.9.9"\n').dns.customUrl).toBe("tls://9.9.9.9")
  })

  it("ignores an unusable DNS URL from the environment", () => {
    const s = applyEnvOverrides(defaultSettings(), { LINKBOX_DNS_URL: "https://" })
    expect(s.dns.customUrl).toBe("")
  })

  it("treats an empty document as defaults", () => {
    expect(parseSettings("")).toEqual(defaultSettings())
  })

  it("applies environment overrides without touching the input", () => {
    const base = defaultSettings()
    const s = applyEnvOverrides(base, {
      LINKBOX_INBOUND_PORT: "1081",
      LINKBOX_ROUTING_MODE: "custom",
      LINKBOX_SKIP_CERT: "yes",
      LINKBOX_CORE_ARGS: "config",
      LINKBOX_DNS_PROXY: "off",
      LINKBOX_MONITOR_INTERVAL_SEC: "0"
    })
    expect(s.inbound.port).toBe(1081)
    expect(s.routing.mode).toBe("custom")
    expect(s.skipCert).toBe(true)
    expect(s.core.args).toBe("config")
    expect(s.dns.useProxy).toBe(false)
    expect(s.monitoring.intervalSec).toBe(1)
    expect(base.inbound.port).toBe(2080)
  })

  it("ignores unknown enum values from the environment", () => {
    const s = applyEnvOverrides(defaultSettings(), { LINKBOX_ROUTING_MODE: "sideways", LINKBOX_INBOUND_PORT: "99999" })
    expect(s.routing.mode).toBe("bypass-local")
    expect(s.inbound.port).toBe(2080)
  })

  it("loads defaults when the file is missing", async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "linkbox-settings-"))
    const s = await loadSettings(path.join(dir, "config.yaml"), {})
    expect(s).toEqual(defaultSettings())
  })

  it("loads a file from disk", async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "linkbox-settings-"))
    const file = path.join(dir, "config.yaml")
    await fsp.writeFile(file, "dns:\n  provider: cloudflare\n  useProxy: false\n", "utf8")
    const s = await loadSettings(file, {})
    expect(s.dns).toEqual({ provider: "cloudflare", customUrl: "", useProxy: false })
  })

  it("lets profile overrides win", () => {
    const s = withOverrides(defaultSettings(), { routing: { mode: "proxy-all" }, vpn: { enabled: true } })
    expect(s.routing.mode).toBe("proxy-all")
    expect(s.routing.proxyList).toBe("proxy_list.txt")
    expect(s.vpn.enabled).toBe(true)
  })

  it("parses env scalars", () => {
    expect(toInt("42", 1)).toBe(42)
    expect(toInt("x", 1)).toBe(1)
    expect(toInt(undefined, 3)).toBe(3)
    expect(toBool("on")).toBe(true)
    expect(toBool("maybe", true)).toBe(true)
  })

  it("ships an example file that matches the defaults", async () => {
    expect(parseSettings(await fsp.readFile(paths.exampleConfig, "utf8"))).toEqual(defaultSettings())
  })
})
