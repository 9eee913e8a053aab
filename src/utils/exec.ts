import { spawn } from "node:child_process"

export interface CmdResult {
  code: number | null
  stdout: string
  stderr: string
}

export interface CmdOptions {
  cwd?: string
  env?: Record<string, string>
  timeoutMs?: number
}

/**
 * Runs a command to completion and captures its output.
 * Rejects when the binary cannot be spawned or the timeout elapses.
 */
export async function captureCmd(command: string, args: string[], options: CmdOptions = {}): Promise<CmdResult> {
  const { cwd, env, timeoutMs = 5000 } = options
  return await new Promise<CmdResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true
    })
    const out: Buffer[] = []
    const err: Buffer[] = []
    let timedOut = false
    const tid = setTimeout(() => {
      timedOut = true
      child.kill("SIGKILL")
    }, timeoutMs)
    child.stdout.on("data", (d: Buffer) => out.push(d))
    child.stderr.on("data", (d: Buffer) => err.push(d))
    child.on("error", (e) => {
      clearTimeout(tid)
      reject(e)
    })
    child.on("close", (code) => {
      clearTimeout(tid)
      if (timedOut) return reject(new Error(`Command timed out after ${timeoutMs}ms: ${command} ${args.join(" ")}`))
      resolve({
        code,
        stdout: Buffer.concat(out).toString("utf8"),
        stderr: Buffer.concat(err).toString("utf8")
      })
    })
  })
}
