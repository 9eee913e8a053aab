import { createLogger, errorMessage } from "../utils/log.js"

const log = createLogger("state")

export interface ProxyStatus {
  running: boolean
  profileId: number | null
  startedAt: number | null
  uptimeSec: number
}

export type ProxyStateListener = (running: boolean, profileId: number | null) => void

/** Which profile the proxy is running, if any, plus change listeners. */
export class ProxyState {
  private running = false
  private profileId: number | null = null
  private startedAt: number | null = null
  private readonly listeners: ProxyStateListener[] = []

  constructor(private readonly now: () => number = Date.now) {}

  get isRunning(): boolean {
    return this.running
  }

  get currentProfileId(): number | null {
    return this.profileId
  }

  setRunning(profileId: number): void {
    this.running = true
    this.profileId = profileId
    this.startedAt = this.now()
    this.notify()
  }

  setStopped(): void {
    if (!this.running && this.profileId == null) return
    this.running = false
    this.profileId = null
    this.startedAt = null
    this.notify()
  }

  subscribe(listener: ProxyStateListener): () => void {
    this.listeners.push(listener)
    return () => {
      const i = this.listeners.indexOf(listener)
      if (i >= 0) this.listeners.splice(i, 1)
    }
  }

  getStatus(): ProxyStatus {
    const uptimeSec = this.startedAt == null ? 0 : Math.max(0, Math.floor((this.now() - this.startedAt) / 1000))
    return { running: this.running, profileId: this.profileId, startedAt: this.startedAt, uptimeSec }
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(this.running, this.profileId)
      } catch (e) {
        log.error(`listener failed: ${errorMessage(e)}`)
      }
    }
  }
}
