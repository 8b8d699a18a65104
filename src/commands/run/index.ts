/***
 *
 *
 *  Run Command
 *
 *  Boots a built system interactively. The console is attached to the
 *  terminal; the VM gets a private copy of the disk image unless
 *  virtualisation.useCoW is off.
 *
 */

import { Logger } from "../../utils/log"
import { Settings } from "../../settings"
import { isWritable } from "../../utils/path"
import type { SystemConfig, VmmKindType } from "../../types/modules"
import { loadProject } from "../../config/project"
import { build } from "../build"
import { resolveTarget, vmmModeFrom, type VmCommandOptions } from "../test"
import {
    Launcher,
    VMM_COMMANDS,
    VmSession,
    cloudHypervisorRunArgs,
    qemuRunArgs,
    resolveFirmware,
    type VmLauncher,
    type VmTarget,
} from "../test/vmm"

export interface RunOptions extends VmCommandOptions {
    // Appended to the VMM command line
    extraArgs?: string[]
}

/**
 * VMM for an interactive run: a --qemu/--ch flag wins over virtualisation.vmm
 */
export function interactiveVmm(options: RunOptions, configured: VmmKindType): VmmKindType {
    const mode = vmmModeFrom(options)
    if (mode === "qemu") return "qemu"
    if (mode === "ch") return "cloud-hypervisor"
    return configured
}

export interface RunVmOptions {
    kind: VmmKindType
    virtualisation: SystemConfig["virtualisation"]
    extraArgs: string[]
    launcher: VmLauncher
    firmware: (kind: VmmKindType) => string
}

/**
 * Starts the VM attached to the terminal and resolves with its exit code
 */
export async function runVm(target: VmTarget, options: RunVmOptions): Promise<number> {
    const { kind, virtualisation } = options
    if (kind === "cloud-hypervisor" && !isWritable("/dev/kvm")) {
        throw new Error("/dev/kvm not available. Cloud Hypervisor requires KVM, try --qemu.")
    }

    const session = await VmSession.create("redox-run-")
    return session.run(async () => {
        const image = virtualisation.useCoW ? await session.copyImage(target.image) : target.image

        let args: string[]
        if (kind === "cloud-hypervisor") {
            args = cloudHypervisorRunArgs({
                image,
                firmware: options.firmware(kind),
                bootloader: target.bootloader,
                virtualisation,
                extraArgs: options.extraArgs,
            })
        } else {
            const ovmf = await session.copyImage(options.firmware(kind), "OVMF.fd")
            args = qemuRunArgs({ image, firmware: ovmf, bootloader: target.bootloader, virtualisation, extraArgs: options.extraArgs })
        }

        Logger.info(`Starting ${VMM_COMMANDS[kind]} (${virtualisation.cpus} CPUs, ${virtualisation.memorySize} MB)`)
        if (kind === "qemu" && !virtualisation.graphics) {
            Logger.info("Press Ctrl+A then X to exit")
        }
        Logger.blank()

        const vm = session.track(options.launcher.launch(Settings.tool(VMM_COMMANDS[kind]), args, null))
        return vm.exited
    })
}

export async function run(options: RunOptions): Promise<number> {
    let virtualisation: SystemConfig["virtualisation"]
    let target: VmTarget

    if (options.image) {
        // A bare image carries no configuration, so the profile is evaluated for VM settings only
        virtualisation = (await loadProject({ profile: options.profile, set: options.set })).system.config.virtualisation
        target = await resolveTarget(options)
    } else {
        const result = await build({ profile: options.profile, set: options.set })
        virtualisation = result.system.config.virtualisation
        target = await resolveTarget({ ...options, image: `${result.toplevel}/redox.img` })
    }

    const kind = interactiveVmm(options, virtualisation.vmm)
    return runVm(target, {
        kind,
        virtualisation,
        extraArgs: options.extraArgs ?? [],
        launcher: Launcher,
        firmware: resolveFirmware,
    })
}
