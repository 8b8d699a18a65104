/***
 *
 *
 *  Bridge Test
 *
 *  Boots the image under Cloud Hypervisor with a virtio-fs share. Once the
 *  guest announces BRIDGE_REBUILD_READY, the host serves its rebuild
 *  request in process while the guest suite keeps reporting FUNC_TEST
 *  results.
 *
 */

import { Logger } from "../../utils/log"
import { Settings } from "../../settings"
import { pathExists } from "../../utils/path"
import { BridgeDaemon, type RootTreeBuilder } from "../bridge/daemon"
import { BRIDGE_READY, FUNCTIONAL_MILESTONES } from "./milestones"
import { VmSession, followSerialLog, launchSerialVm, type VmTarget } from "./vmm"
import { monitorTestSuite, reportSuite, type SuiteRun } from "./functional-test"
import { resolveTimeout, type VmTestEnvironment } from "./utils"

export const BRIDGE_TEST_TIMEOUT = 180
// Attempts, half a second apart, to find the guest's request after it said it was ready
const REQUEST_POLLS = 60
const SOCKET_POLLS = 20

export interface BridgeTestOptions {
    timeout?: number
    verbose: boolean
}

export async function runBridgeTest(
    target: VmTarget,
    options: BridgeTestOptions,
    env: VmTestEnvironment,
    builder: RootTreeBuilder,
): Promise<SuiteRun> {
    if (!env.kvmWritable) {
        throw new Error("/dev/kvm not available. Bridge test requires KVM for Cloud Hypervisor.")
    }
    const timeoutSeconds = resolveTimeout(options.timeout, "BRIDGE_TEST_TIMEOUT", BRIDGE_TEST_TIMEOUT)

    Logger.title("Redox OS Build Bridge Test")
    Logger.info(`Timeout: ${timeoutSeconds}s`)
    Logger.blank()

    const session = await VmSession.create("redox-bridge-test-")
    return session.run(async () => {
        const sharedDir = session.path("shared")
        const daemon = new BridgeDaemon({ sharedDir, builder, clock: env.clock })
        await daemon.prepare()

        const socket = session.path("virtiofsd.sock")
        const virtiofsdLog = session.path("virtiofsd.log")
        session.track(env.launcher.launch(Settings.tool("virtiofsd"), [
            `--socket-path=${socket}`,
            `--shared-dir=${sharedDir}`,
            "--sandbox=none",
            "--cache=never",
            "--log-level=warn",
        ], virtiofsdLog))

        for (let i = 0; i < SOCKET_POLLS && !pathExists(socket); i++) {
            await env.clock.sleep(100)
        }
        if (!pathExists(socket)) {
            throw new Error(`virtiofsd socket did not appear, see ${virtiofsdLog}`)
        }
        Logger.success("virtiofsd started")

        const { vm, serialLog, vmmLog } = await launchSerialVm(session, target, "cloud-hypervisor", env.launcher, env.firmware, socket)
        const tail = options.verbose ? followSerialLog(session, env.launcher, serialLog) : null

        const run = await monitorTestSuite({
            vm,
            serialLog,
            timeoutMs: timeoutSeconds * 1000,
            clock: env.clock,
            milestones: [...FUNCTIONAL_MILESTONES, BRIDGE_READY],
            onMilestone: async (event) => {
                if (event.id !== BRIDGE_READY.id) return
                Logger.log("Guest ready for bridge rebuild, serving requests...")

                for (let i = 0; i < REQUEST_POLLS; i++) {
                    if (await daemon.processPending() > 0) {
                        Logger.success("Bridge response sent")
                        return
                    }
                    await env.clock.sleep(500)
                }
                Logger.warning("No rebuild request found (timeout)")
            },
        })
        await tail?.stop()

        await reportSuite(run, {
            title: "BRIDGE TESTS",
            tailCount: 40,
            logs: [
                ...(run.verdict === "boot-failed" ? [{ title: "VMM output", path: vmmLog }] : []),
                { title: "virtiofsd output", path: virtiofsdLog },
            ],
        })

        return run
    })
}
