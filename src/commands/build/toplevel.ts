/***
 *
 *
 *  System Toplevel
 *
 *  <output>/systems/<buildHash>/
 *      redox.img
 *      boot/{BOOTX64.EFI,kernel,initfs}
 *      root-tree/
 *      version.json
 *      README
 *
 */

import { join } from "path"
import { cp, mkdir, readFile, rm, writeFile } from "fs/promises"
import { z } from "zod"
import { REDOX_SYSTEM_VERSION, REDOX_TARGET } from "../../version"
import { copyIfExists } from "../../utils/files"
import { fileExists } from "../../utils/path"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet } from "../../types/packages"
import { hashValue, type PackageFingerprints } from "./cache"

export const VersionInfoSchema = z.object({
    redoxSystemVersion: z.string(),
    target: z.string(),
    profile: z.string(),
    hostname: z.string(),
    packageCount: z.number().int().nonnegative(),
    driverCount: z.number().int().nonnegative(),
    userCount: z.number().int().nonnegative(),
    buildHash: z.string(),
})

export type VersionInfo = z.infer<typeof VersionInfoSchema>

export const README = `Redox OS System
Built with redox-forge

Contents:
  redox.img - Bootable disk image
  boot/initfs - Initial RAM filesystem
  boot/kernel - Kernel image
  boot/BOOTX64.EFI - UEFI bootloader
  root-tree/ - Root filesystem contents
  version.json - System identity
`

/**
 * Hash of everything a build reads: the evaluated configuration and the package index
 */
export function computeBuildHash(system: EvaluatedSystem, packages: PackageSet, fingerprints: PackageFingerprints): string {
    return hashValue({
        profile: system.profile,
        config: system.config,
        packages: packages.all().map(pkg => ({ name: pkg.name, version: pkg.version, path: pkg.path })),
        contents: fingerprints,
    })
}

export function toplevelPath(outputDir: string, buildHash: string): string {
    return join(outputDir, "systems", buildHash)
}

export function createVersionInfo(system: EvaluatedSystem, buildHash: string): VersionInfo {
    return {
        redoxSystemVersion: REDOX_SYSTEM_VERSION,
        target: REDOX_TARGET,
        profile: system.profile,
        hostname: system.config.time.hostname,
        packageCount: system.plan.packages.length,
        driverCount: system.plan.allDrivers.length,
        userCount: Object.keys(system.config.users.users).length,
        buildHash,
    }
}

export async function readVersionInfo(toplevel: string): Promise<VersionInfo | null> {
    const path = join(toplevel, "version.json")
    if (!fileExists(path)) return null
    const result = VersionInfoSchema.safeParse(JSON.parse(await readFile(path, "utf-8")))
    return result.success ? result.data : null
}

/**
 * A toplevel is complete once its version.json names the same build hash
 */
export async function isToplevelCached(toplevel: string, buildHash: string): Promise<boolean> {
    const info = await readVersionInfo(toplevel)
    return info !== null && info.buildHash === buildHash && fileExists(join(toplevel, "redox.img"))
}

export interface ToplevelInputs {
    diskImage: string
    bootloader: string
    kernel: string
    initfs: string
    rootTree: string
}

export async function writeToplevel(toplevel: string, inputs: ToplevelInputs, info: VersionInfo): Promise<void> {
    await rm(toplevel, { recursive: true, force: true })
    await mkdir(join(toplevel, "boot"), { recursive: true })

    await copyIfExists(inputs.diskImage, join(toplevel, "redox.img"))
    await copyIfExists(inputs.bootloader, join(toplevel, "boot", "BOOTX64.EFI"))
    await copyIfExists(inputs.kernel, join(toplevel, "boot", "kernel"))
    await copyIfExists(inputs.initfs, join(toplevel, "boot", "initfs"))
    await cp(inputs.rootTree, join(toplevel, "root-tree"), { recursive: true, verbatimSymlinks: true })

    await writeFile(join(toplevel, "README"), README)
    // Written last: its presence marks the toplevel as complete
    await writeFile(join(toplevel, "version.json"), JSON.stringify(info, null, 2) + "\n")
}
