/***
 *
 *
 *  VM Test Commands
 *
 *  boot-test, functional-test and bridge-test. Each builds the project
 *  (usually a cache hit) unless an image is given.
 *
 */

import { dirname, join } from "path"
import { Settings } from "../../settings"
import { fileExists } from "../../utils/path"
import { build } from "../build"
import type { ProjectOptions } from "../../config/project"
import { ProjectRootTreeBuilder, bridgeProfileFromEnv } from "../bridge/builder"
import { runBootTest } from "./boot-test"
import { runFunctionalTest } from "./functional-test"
import { runBridgeTest } from "./bridge-test"
import { defaultTestEnvironment } from "./utils"
import type { VmTarget, VmmMode } from "./vmm"

export interface VmCommandOptions extends ProjectOptions {
    qemu?: boolean
    ch?: boolean
    timeout?: number
    // Streams the serial console, defaults to --verbose
    verbose?: boolean
    // Disk image to boot instead of building the project
    image?: string
}

export function vmmModeFrom(options: VmCommandOptions): VmmMode {
    if (options.qemu && options.ch) throw new Error("--qemu and --ch cannot be combined")
    if (options.qemu) return "qemu"
    if (options.ch) return "ch"
    return "auto"
}

/**
 * Disk image and bootloader of a toplevel, building it when no image is given
 */
export async function resolveTarget(options: VmCommandOptions): Promise<VmTarget> {
    if (options.image) {
        if (!fileExists(options.image)) throw new Error(`Disk image not found: ${options.image}`)
        return { image: options.image, bootloader: join(dirname(options.image), "boot", "BOOTX64.EFI") }
    }

    const result = await build({ profile: options.profile, set: options.set })
    return {
        image: join(result.toplevel, "redox.img"),
        bootloader: join(result.toplevel, "boot", "BOOTX64.EFI"),
    }
}

/**
 * Returns true when the test passed
 */
export async function bootTest(options: VmCommandOptions): Promise<boolean> {
    const mode = vmmModeFrom(options)
    const target = await resolveTarget(options)
    const result = await runBootTest(target, { mode, timeout: options.timeout, verbose: options.verbose ?? Settings.verbose }, defaultTestEnvironment())
    return result.verdict === "passed"
}

export async function functionalTest(options: VmCommandOptions): Promise<boolean> {
    const mode = vmmModeFrom(options)
    const target = await resolveTarget({ ...options, profile: options.profile ?? "functional-test" })
    const result = await runFunctionalTest(target, { mode, timeout: options.timeout, verbose: options.verbose ?? Settings.verbose }, defaultTestEnvironment())
    return result.verdict === "passed"
}

export async function bridgeTest(options: VmCommandOptions): Promise<boolean> {
    const target = await resolveTarget(options)
    const builder = new ProjectRootTreeBuilder(bridgeProfileFromEnv())
    const result = await runBridgeTest(target, { timeout: options.timeout, verbose: options.verbose ?? Settings.verbose }, defaultTestEnvironment(), builder)
    return result.verdict === "passed"
}
