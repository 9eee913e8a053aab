import { parseLink } from "../link/index.js"
import { isErrno, readJson, writeJson } from "../utils/fs.js"
import type { ProfileOverrides } from "../settings/settings.js"
import { createLogger, errorMessage } from "../utils/log.js"
import {
  ProfileEntrySchema,
  ProfileGroupSchema,
  StoreSnapshotSchema,
  type ProfileEntry,
  type ProfileGroup,
  type StoreMeta
} from "./profile.schema.js"
import { cloneProfile, type ProxyProfile } from "./types.js"

const log = createLogger("store")

export const DEFAULT_GROUP_ID = 0

function defaultGroup(): ProfileGroup {
  return { id: DEFAULT_GROUP_ID, name: "Default", isSubscription: false, subscriptionUrl: "", lastUpdated: 0, subUserInfo: "" }
}

function freshMeta(): StoreMeta {
  return { version: 1, nextProfileId: 1, nextGroupId: 1, currentGroupId: DEFAULT_GROUP_ID }
}

/**
 * Profiles and their groups, persisted as one JSON snapshot. Group 0 always
 * exists; ids are handed out here and never reused within a store file.
 */
export class ProfileStore {
  private readonly profiles = new Map<number, ProfileEntry>()
  private readonly groups = new Map<number, ProfileGroup>([[DEFAULT_GROUP_ID, defaultGroup()]])
  private meta: StoreMeta = freshMeta()

  /** `filePath` null keeps the store in memory only. */
  constructor(readonly filePath: string | null = null) {}

  get currentGroupId(): number {
    return this.meta.currentGroupId
  }

  set currentGroupId(id: number) {
    if (!this.groups.has(id)) throw new Error(`unknown group ${id}`)
    this.meta.currentGroupId = id
  }

  get size(): number {
    return this.profiles.size
  }

  getProfile(id: number): ProfileEntry | undefined {
    return this.profiles.get(id)
  }

  getGroup(id: number): ProfileGroup | undefined {
    return this.groups.get(id)
  }

  listGroups(): ProfileGroup[] {
    return [...this.groups.values()].sort((a, b) => a.id - b.id)
  }

  listGroup(groupId: number): ProfileEntry[] {
    return [...this.profiles.values()].filter((e) => e.groupId === groupId)
  }

  listAll(): ProfileEntry[] {
    return [...this.profiles.values()]
  }

  /** Stores a copy of `profile`; the copy carries the assigned id and group. */
  addProfile(profile: ProxyProfile, groupId: number = this.meta.currentGroupId): ProfileEntry {
    if (!this.groups.has(groupId)) throw new Error(`unknown group ${groupId}`)
    const id = this.meta.nextProfileId++
    const stored = cloneProfile(profile)
    stored.id = id
    stored.groupId = groupId
    const entry: ProfileEntry = { id, groupId, profile: stored, latencyMs: -1, lastUsed: 0 }
    this.profiles.set(id, entry)
    return entry
  }

  removeProfile(id: number): boolean {
    return this.profiles.delete(id)
  }

  parseAndAdd(link: string, groupId?: number): ProfileEntry | null {
    const profile = parseLink(link)
    return profile ? this.addProfile(profile, groupId) : null
  }

  addGroup(name: string, subscriptionUrl = ""): ProfileGroup {
    const group: ProfileGroup = {
      id: this.meta.nextGroupId++,
      name,
      isSubscription: subscriptionUrl !== "",
      subscriptionUrl,
      lastUpdated: 0,
      subUserInfo: ""
    }
    this.groups.set(group.id, group)
    return group
  }

  /** Deletes the group and its profiles. The default group cannot be removed. */
  removeGroup(groupId: number): boolean {
    if (groupId === DEFAULT_GROUP_ID) {
      log.warn("the default group cannot be removed")
      return false
    }
    if (!this.groups.has(groupId)) return false
    this.clearGroup(groupId)
    this.groups.delete(groupId)
    if (this.meta.currentGroupId === groupId) this.meta.currentGroupId = DEFAULT_GROUP_ID
    return true
  }

  /** Returns how many profiles were removed. */
  clearGroup(groupId: number): number {
    let removed = 0
    for (const entry of this.listGroup(groupId)) {
      this.profiles.delete(entry.id)
      removed++
    }
    return removed
  }

  replaceGroupProfiles(groupId: number, profiles: ProxyProfile[]): ProfileEntry[] {
    if (!this.groups.has(groupId)) throw new Error(`unknown group ${groupId}`)
    this.clearGroup(groupId)
    return profiles.map((p) => this.addProfile(p, groupId))
  }

  updateGroup(groupId: number, patch: Partial<Omit<ProfileGroup, "id">>): ProfileGroup {
    const group = this.groups.get(groupId)
    if (!group) throw new Error(`unknown group ${groupId}`)
    Object.assign(group, patch)
    return group
  }

  markUsed(id: number, at: number = Date.now()): void {
    const entry = this.profiles.get(id)
    if (entry) entry.lastUsed = at
  }

  setLatency(id: number, ms: number): void {
    const entry = this.profiles.get(id)
    if (entry) entry.latencyMs = ms
  }

  setOverrides(id: number, overrides: ProfileOverrides | undefined): void {
    const entry = this.profiles.get(id)
    if (!entry) throw new Error(`unknown profile ${id}`)
    if (overrides) entry.overrides = overrides
    else delete entry.overrides
  }

  /** Replaces the in-memory state with the file's. A missing file leaves a fresh store. */
  async load(): Promise<void> {
    this.profiles.clear()
    this.groups.clear()
    this.groups.set(DEFAULT_GROUP_ID, defaultGroup())
    this.meta = freshMeta()
    if (!this.filePath) return

    let raw: unknown
    try {
      raw = await readJson(this.filePath)
    } catch (e) {
      if (isErrno(e) && e.code === "ENOENT") return
      throw new Error(`cannot read profile store ${this.filePath}: ${errorMessage(e)}`)
    }

    const snapshot = StoreSnapshotSchema.safeParse(raw)
    if (!snapshot.success) throw new Error(`invalid profile store ${this.filePath}: ${snapshot.error.issues[0]?.message ?? "bad shape"}`)
    this.meta = { ...snapshot.data.meta }

    snapshot.data.groups.forEach((item, i) => {
      const parsed = ProfileGroupSchema.safeParse(item)
      if (!parsed.success) {
        log.warn(`skipping invalid group #${i}: ${parsed.error.issues[0]?.message ?? ""}`)
        return
      }
      this.groups.set(parsed.data.id, parsed.data)
    })

    let maxProfileId = 0
    let maxGroupId = 0
    for (const id of this.groups.keys()) maxGroupId = Math.max(maxGroupId, id)
    snapshot.data.profiles.forEach((item, i) => {
      const parsed = ProfileEntrySchema.safeParse(item)
      if (!parsed.success) {
        log.warn(`skipping invalid profile #${i}: ${parsed.error.issues[0]?.message ?? ""}`)
        return
      }
      const entry = parsed.data
      if (!this.groups.has(entry.groupId)) {
        log.warn(`profile ${entry.id} points at missing group ${entry.groupId}, moved to default`)
        entry.groupId = DEFAULT_GROUP_ID
      }
      entry.profile.id = entry.id
      entry.profile.groupId = entry.groupId
      this.profiles.set(entry.id, entry)
      maxProfileId = Math.max(maxProfileId, entry.id)
    })

    // Never hand out an id that is already taken, whatever the meta says.
    this.meta.nextProfileId = Math.max(this.meta.nextProfileId, maxProfileId + 1)
    this.meta.nextGroupId = Math.max(this.meta.nextGroupId, maxGroupId + 1)
    if (!this.groups.has(this.meta.currentGroupId)) this.meta.currentGroupId = DEFAULT_GROUP_ID
  }

  async save(): Promise<void> {
    if (!this.filePath) return
    await writeJson(this.filePath, {
      meta: this.meta,
      groups: this.listGroups(),
      profiles: [...this.profiles.values()].sort((a, b) => a.id - b.id)
    })
  }
}
