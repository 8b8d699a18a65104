/***
 *
 *
 *  VM Test Utilities
 *
 */

import { readFile } from "fs/promises"
import { Logger } from "../../utils/log"
import { fileExists } from "../../utils/path"
import type { VmmKindType } from "../../types/modules"
import { formatElapsed, tailLines, type MilestoneTracker } from "./milestones"
import { SystemClock, type Clock } from "./watcher"
import { Launcher, kvmAvailable, resolveFirmware, type VmLauncher } from "./vmm"

export interface VmTestEnvironment {
    launcher: VmLauncher
    clock: Clock
    kvmWritable: boolean
    firmware: (kind: VmmKindType) => string
}

export function defaultTestEnvironment(): VmTestEnvironment {
    return {
        launcher: Launcher,
        clock: SystemClock,
        kvmWritable: kvmAvailable(),
        firmware: resolveFirmware,
    }
}

/**
 * Timeout in seconds from the command line, then the environment, then the default
 */
export function resolveTimeout(option: number | undefined, variable: string, fallback: number): number {
    if (option !== undefined) return option
    const raw = process.env[variable]
    if (raw === undefined || raw.trim() === "") return fallback
    const parsed = Number(raw)
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`${variable} must be a positive number of seconds, got "${raw}"`)
    }
    return parsed
}

export function printTimeline(tracker: MilestoneTracker): void {
    Logger.plain("  Milestones:")
    for (const status of tracker.summary()) {
        const elapsed = status.elapsedMs === null ? "  --  " : formatElapsed(status.elapsedMs)
        Logger.milestone(elapsed, status.label, status.elapsedMs !== null)
    }
}

export function printSerialTail(content: string, count: number): void {
    Logger.plain(`  Last ${count} lines of serial output:`)
    Logger.plain(`  ${"─".repeat(40)}`)
    Logger.raw(tailLines(content, count))
    Logger.plain(`  ${"─".repeat(40)}`)
}

export async function printLogFile(title: string, path: string): Promise<void> {
    if (!fileExists(path)) return
    const text = await readFile(path, "utf-8")
    if (!text.trim()) return
    Logger.blank()
    Logger.plain(`  ${title}:`)
    Logger.raw(text)
}

export function printBanner(message: string, ok: boolean): void {
    Logger.blank()
    if (ok) {
        Logger.success(message)
    } else {
        Logger.error(message)
    }
}
