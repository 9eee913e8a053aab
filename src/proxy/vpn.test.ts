import { describe, expect, it } from "vitest"
import type { CmdResult } from "../utils/exec.js"
import { NmcliVpnStatus, type CommandRunner } from "./vpn.js"

function fakeRunner(outputs: Record<string, string | Error>): { run: CommandRunner; calls: string[] } {
  const calls: string[] = []
  const run: CommandRunner = async (command, args) => {
    const key = [command, ...args].join(" ")
    calls.push(key)
    const out = outputs[key]
    if (out instanceof Error) throw out
    const res: CmdResult = out == null ? { code: 10, stdout: "", stderr: "no match" } : { code: 0, stdout: out, stderr: "" }
    return res
  }
  return { run, calls }
}

const ACTIVE = "nmcli -t -f NAME connection show --active"

describe("NmcliVpnStatus", () => {
  it("checks active connections by exact name", async () => {
    const { run } = fakeRunner({ [ACTIVE]: "Wired\ncorp-vpn\n" })
    const vpn = new NmcliVpnStatus(run)
    expect(await vpn.isActive("corp-vpn")).toBe(true)
    expect(await vpn.isActive("corp")).toBe(false)
    expect(await vpn.isActive("")).toBe(false)
  })

  it("degrades to false when nmcli is missing", async () => {
    const { run } = fakeRunner({ [ACTIVE]: new Error("spawn nmcli ENOENT") })
    expect(await new NmcliVpnStatus(run).isActive("corp-vpn")).toBe(false)
  })

  it("reads the device from GENERAL.DEVICE first", async () => {
    const { run } = fakeRunner({
      [ACTIVE]: "corp-vpn",
      "nmcli -t -f GENERAL.DEVICE connection show corp-vpn": "GENERAL.DEVICE:tun0\n"
    })
    expect(await new NmcliVpnStatus(run).getInterface("corp-vpn")).toBe("tun0")
  })

  it("falls back to the first tunnel link", async () => {
    const { run, calls } = fakeRunner({
      [ACTIVE]: "corp-vpn",
      "nmcli -t -f GENERAL.DEVICE connection show corp-vpn": "GENERAL.DEVICE:--",
      "nmcli -t -f DEVICE connection show --active corp-vpn": "",
      "ip -o link show": "1: lo: <LOOPBACK,UP>\n2: eth0: <UP>\n5: tap1@if3: <UP>\n"
    })
    expect(await new NmcliVpnStatus(run).getInterface("corp-vpn")).toBe("tap1")
    expect(calls.at(-1)).toBe("ip -o link show")
  })

  it("has no interface for an inactive connection", async () => {
    const { run, calls } = fakeRunner({ [ACTIVE]: "Wired" })
    expect(await new NmcliVpnStatus(run).getInterface("corp-vpn")).toBeNull()
    expect(calls).toEqual([ACTIVE])
  })

  it("splits DNS servers on commas and spaces", async () => {
    const { run } = fakeRunner({
      [ACTIVE]: "corp-vpn",
      "nmcli -t -f ipv4.dns connection show --active corp-vpn": "ipv4.dns:10.0.0.53,10.0.0.54 10.0.0.55"
    })
    expect(await new NmcliVpnStatus(run).getDnsServers("corp-vpn")).toEqual(["10.0.0.53", "10.0.0.54", "10.0.0.55"])
  })

  it("uses the stored DNS config when the connection is down", async () => {
    const { run } = fakeRunner({
      [ACTIVE]: "",
      "nmcli -t -f ipv4.dns connection show corp-vpn": "ipv4.dns:--"
    })
    expect(await new NmcliVpnStatus(run).getDnsServers("corp-vpn")).toEqual([])
  })

  it("skips tunnels and the excluded device when finding the default interface", async () => {
    const { run } = fakeRunner({
      "ip route show default": "default dev tun0 scope link\ndefault via 192.168.1.1 dev wlp2s0 proto dhcp\n"
    })
    expect(await new NmcliVpnStatus(run).getDefaultInterface("tun0")).toBe("wlp2s0")
  })

  it("falls back to the first physical link that is up", async () => {
    const { run } = fakeRunner({
      "ip route show default": "",
      "ip -o link show up": "1: lo: <LOOPBACK,UP>\n3: docker0: <UP>\n4: enp3s0: <UP>\n"
    })
    expect(await new NmcliVpnStatus(run).getDefaultInterface()).toBe("enp3s0")
  })

  it("lists vpn-like connections only", async () => {
    const { run } = fakeRunner({
      "nmcli -t -f NAME,TYPE connection show": "Wired:802-3-ethernet\ncorp-vpn:vpn\nwg0:wireguard\n"
    })
    expect(await new NmcliVpnStatus(run).listConnections()).toEqual(["corp-vpn", "wg0"])
  })
})
