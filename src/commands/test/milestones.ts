/***
 *
 *
 *  Serial Console Milestones
 *
 *  Marker strings the guest prints on its serial console, and the
 *  FUNC_TEST protocol used by the in-guest test suites:
 *
 *      FUNC_TESTS_START
 *      FUNC_TEST:<name>:PASS
 *      FUNC_TEST:<name>:FAIL:<reason>
 *      FUNC_TEST:<name>:SKIP
 *      FUNC_TESTS_COMPLETE
 *
 */

export interface MilestoneDefinition {
    id: string
    label: string
    marker: RegExp
}

export interface MilestoneEvent {
    id: string
    label: string
    elapsedMs: number
}

export interface MilestoneStatus {
    id: string
    label: string
    elapsedMs: number | null
}

export const BOOTLOADER: MilestoneDefinition = { id: "bootloader", label: "Bootloader started", marker: /Redox OS Bootloader/ }
export const KERNEL: MilestoneDefinition = { id: "kernel", label: "Kernel running", marker: /Redox OS starting/ }
export const BOOT_COMPLETE: MilestoneDefinition = { id: "boot", label: "Boot complete", marker: /Boot Complete/ }
export const SHELL: MilestoneDefinition = { id: "shell", label: "Shell ready", marker: /ion>|Welcome to Redox/ }
export const TESTS_START: MilestoneDefinition = { id: "tests-start", label: "Test suite started", marker: /FUNC_TESTS_START/ }
export const TESTS_COMPLETE: MilestoneDefinition = { id: "tests-complete", label: "Test suite complete", marker: /FUNC_TESTS_COMPLETE/ }
export const BRIDGE_READY: MilestoneDefinition = { id: "bridge-ready", label: "Guest ready for bridge rebuild", marker: /BRIDGE_REBUILD_READY/ }

export const BOOT_MILESTONES = [BOOTLOADER, KERNEL, BOOT_COMPLETE, SHELL]
export const FUNCTIONAL_MILESTONES = [BOOTLOADER, KERNEL, BOOT_COMPLETE, TESTS_START, TESTS_COMPLETE]

/**
 * Formats milliseconds as seconds with three decimals, e.g. 3120 → "3.120s"
 */
export function formatElapsed(ms: number): string {
    const whole = Math.max(0, Math.round(ms))
    return `${Math.floor(whole / 1000)}.${String(whole % 1000).padStart(3, "0")}s`
}

/**
 * Records the first time each marker shows up in the console output
 */
export class MilestoneTracker {

    private readonly reachedAt = new Map<string, number>()

    constructor(private readonly milestones: readonly MilestoneDefinition[]) {}

    /**
     * Checks the full console output and returns the milestones reached for the first time
     */
    public observe(content: string, elapsedMs: number): MilestoneEvent[] {
        const events: MilestoneEvent[] = []
        for (const milestone of this.milestones) {
            if (this.reachedAt.has(milestone.id)) continue
            if (!milestone.marker.test(content)) continue
            this.reachedAt.set(milestone.id, elapsedMs)
            events.push({ id: milestone.id, label: milestone.label, elapsedMs })
        }
        return events
    }

    public has(id: string): boolean {
        return this.reachedAt.has(id)
    }

    public elapsedFor(id: string): number | undefined {
        return this.reachedAt.get(id)
    }

    public summary(): MilestoneStatus[] {
        return this.milestones.map(milestone => ({
            id: milestone.id,
            label: milestone.label,
            elapsedMs: this.reachedAt.get(milestone.id) ?? null,
        }))
    }
}

// =========================================================================
// FUNC_TEST PROTOCOL
// =========================================================================

export type FuncTestStatus = "PASS" | "FAIL" | "SKIP"

export interface FuncTestResult {
    name: string
    status: FuncTestStatus
    reason: string
}

export interface FuncTestCounts {
    passed: number
    failed: number
    skipped: number
    total: number
}

const FUNC_TEST_PREFIX = "FUNC_TEST:"

function isFuncTestStatus(value: string): value is FuncTestStatus {
    return value === "PASS" || value === "FAIL" || value === "SKIP"
}

export function parseFuncTestLine(line: string): FuncTestResult | null {
    const clean = line.replace(/\r/g, "")
    if (!clean.startsWith(FUNC_TEST_PREFIX)) return null

    const [, name = "", status = "", ...rest] = clean.split(":")
    if (!name || !isFuncTestStatus(status)) return null

    // Reasons may contain colons of their own
    return { name, status, reason: rest.join(":") }
}

/**
 * Splits console output into lines, leaving out a trailing partial line unless final
 */
function completeLines(content: string, final: boolean): string[] {
    const lines = content.replace(/\r/g, "").split("\n")
    const last = lines.pop() ?? ""
    if (final && last) lines.push(last)
    return lines
}

/**
 * Parses FUNC_TEST lines incrementally as the console log grows
 */
export class FuncTestCollector {

    private readonly results: FuncTestResult[] = []
    private parsedLines = 0

    /**
     * Returns the results that appeared since the previous call
     */
    public feed(content: string, final = false): FuncTestResult[] {
        const lines = completeLines(content, final).filter(line => line.startsWith(FUNC_TEST_PREFIX))
        const fresh = lines.slice(this.parsedLines)
        this.parsedLines = lines.length

        const parsed = fresh.flatMap(line => {
            const result = parseFuncTestLine(line)
            return result ? [result] : []
        })
        this.results.push(...parsed)
        return parsed
    }

    public all(): FuncTestResult[] {
        return [...this.results]
    }

    public failures(): FuncTestResult[] {
        return this.results.filter(result => result.status === "FAIL")
    }

    public counts(): FuncTestCounts {
        const passed = this.results.filter(result => result.status === "PASS").length
        const failed = this.results.filter(result => result.status === "FAIL").length
        const skipped = this.results.filter(result => result.status === "SKIP").length
        return { passed, failed, skipped, total: passed + failed + skipped }
    }
}

/**
 * Last `count` lines of console output
 */
export function tailLines(content: string, count: number): string {
    const lines = content.replace(/\r/g, "").split("\n")
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop()
    return lines.slice(-count).join("\n")
}
