/***
 *
 *
 *  Functional Test
 *
 *  Boots an image whose startup runs the in-guest test suite and collects
 *  the FUNC_TEST results from the serial console.
 *
 */

import { Logger } from "../../utils/log"
import type { VmmKindType } from "../../types/modules"
import {
    FUNCTIONAL_MILESTONES,
    FuncTestCollector,
    MilestoneTracker,
    formatElapsed,
    type FuncTestCounts,
    type FuncTestResult,
    type MilestoneDefinition,
    type MilestoneEvent,
} from "./milestones"
import { watchSerialLog, type Clock } from "./watcher"
import { VmSession, followSerialLog, launchSerialVm, selectVmm, type VmHandle, type VmTarget, type VmmMode } from "./vmm"
import { printBanner, printLogFile, printSerialTail, resolveTimeout, type VmTestEnvironment } from "./utils"

export const FUNCTIONAL_TEST_TIMEOUT = 120
export const FUNCTIONAL_TEST_TCG_TIMEOUT = 300

export type SuiteVerdict = "passed" | "failed" | "boot-failed" | "incomplete"

export interface SuiteRun {
    verdict: SuiteVerdict
    counts: FuncTestCounts
    failures: FuncTestResult[]
    milestones: MilestoneTracker
    elapsedMs: number
    content: string
}

export interface SuiteMonitorOptions {
    vm: VmHandle
    serialLog: string
    timeoutMs: number
    clock: Clock
    milestones?: MilestoneDefinition[]
    // Called once per milestone as it is reached, before the next poll
    onMilestone?: (event: MilestoneEvent) => Promise<void>
}

export function suiteVerdict(tracker: MilestoneTracker, counts: FuncTestCounts): SuiteVerdict {
    const complete = tracker.has("tests-complete")
    if (complete && counts.failed === 0 && counts.total > 0) return "passed"
    if (complete && counts.failed > 0) return "failed"
    if (!tracker.has("boot")) return "boot-failed"
    return "incomplete"
}

function printResult(result: FuncTestResult): void {
    switch (result.status) {
        case "PASS":
            Logger.plain(`    ✓ ${result.name}`)
            break
        case "FAIL":
            Logger.plain(`    ✗ ${result.name}: ${result.reason}`)
            break
        case "SKIP":
            Logger.plain(`    ⊘ ${result.name} (skipped)`)
            break
    }
}

/**
 * Follows the console until the suite reports completion, the VM exits or time runs out
 */
export async function monitorTestSuite(options: SuiteMonitorOptions): Promise<SuiteRun> {
    const tracker = new MilestoneTracker(options.milestones ?? FUNCTIONAL_MILESTONES)
    const collector = new FuncTestCollector()

    const watch = await watchSerialLog({
        serialLog: options.serialLog,
        vm: options.vm,
        timeoutMs: options.timeoutMs,
        pollMs: 100,
        clock: options.clock,
        onOutput: async (content, elapsedMs) => {
            const events = tracker.observe(content, elapsedMs)

            for (const event of events) {
                if (event.id === "tests-complete") continue
                Logger.milestone(formatElapsed(event.elapsedMs), event.label)
                await options.onMilestone?.(event)
            }

            if (tracker.has("tests-start")) {
                collector.feed(content).forEach(printResult)
            }

            const completed = events.find(event => event.id === "tests-complete")
            if (completed) {
                // Results printed on the completion line itself are complete as well
                collector.feed(content, true).forEach(printResult)
                Logger.milestone(formatElapsed(completed.elapsedMs), completed.label)
                return true
            }
            return false
        },
    })

    if (watch.reason !== "done") {
        collector.feed(watch.content, true).forEach(printResult)
    }

    const counts = collector.counts()
    return {
        verdict: suiteVerdict(tracker, counts),
        counts,
        failures: collector.failures(),
        milestones: tracker,
        elapsedMs: watch.elapsedMs,
        content: watch.content,
    }
}

export interface SuiteReportOptions {
    // "FUNCTIONAL TESTS" or "BRIDGE TESTS"
    title: string
    tailCount: number
    logs: { title: string, path: string }[]
}

export async function reportSuite(run: SuiteRun, options: SuiteReportOptions): Promise<void> {
    const { counts } = run

    Logger.title("Results")
    Logger.plain(`    Passed:  ${counts.passed}`)
    Logger.plain(`    Failed:  ${counts.failed}`)
    Logger.plain(`    Skipped: ${counts.skipped}`)
    Logger.plain(`    Total:   ${counts.total}`)
    Logger.blank()
    Logger.plain(`  Total time: ${formatElapsed(run.elapsedMs)}`)

    if (run.failures.length > 0) {
        Logger.blank()
        Logger.plain("  Failed tests:")
        for (const failure of run.failures) {
            Logger.plain(`    ✗ ${failure.name}: ${failure.reason}`)
        }
    }

    switch (run.verdict) {
        case "passed":
            printBanner(`${options.title} PASSED`, true)
            return
        case "failed":
            printBanner(`${options.title} FAILED: ${counts.failed} of ${counts.total} tests failed`, false)
            return
        case "boot-failed":
            printBanner("BOOT FAILED", false)
            break
        case "incomplete":
            printBanner("TESTS DID NOT COMPLETE", false)
            break
    }

    Logger.blank()
    printSerialTail(run.content, options.tailCount)
    for (const log of options.logs) {
        await printLogFile(log.title, log.path)
    }
}

export interface FunctionalTestOptions {
    mode: VmmMode
    timeout?: number
    verbose: boolean
}

export interface FunctionalTestResult extends SuiteRun {
    vmm: VmmKindType
}

export async function runFunctionalTest(target: VmTarget, options: FunctionalTestOptions, env: VmTestEnvironment): Promise<FunctionalTestResult> {
    const selection = selectVmm(options.mode, env.kvmWritable)
    let timeoutSeconds = resolveTimeout(options.timeout, "FUNCTIONAL_TEST_TIMEOUT", FUNCTIONAL_TEST_TIMEOUT)
    if (selection.fellBack) {
        Logger.warning("/dev/kvm not available, falling back to QEMU TCG (slower)")
        timeoutSeconds = Math.max(timeoutSeconds, FUNCTIONAL_TEST_TCG_TIMEOUT)
    }

    Logger.title("Redox OS Functional Test Suite")
    Logger.info(`VMM:     ${selection.kind}`)
    Logger.info(`Timeout: ${timeoutSeconds}s`)
    Logger.blank()

    const session = await VmSession.create("redox-functional-test-")
    return session.run(async () => {
        const { vm, serialLog, vmmLog } = await launchSerialVm(session, target, selection.kind, env.launcher, env.firmware)
        const tail = options.verbose ? followSerialLog(session, env.launcher, serialLog) : null

        const run = await monitorTestSuite({ vm, serialLog, timeoutMs: timeoutSeconds * 1000, clock: env.clock })
        await tail?.stop()

        await reportSuite(run, {
            title: "FUNCTIONAL TESTS",
            tailCount: 30,
            logs: run.verdict === "boot-failed" ? [{ title: "VMM output", path: vmmLog }] : [],
        })

        return { ...run, vmm: selection.kind }
    })
}
