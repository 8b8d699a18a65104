/***
 *
 *
 *  Initfs
 *
 *  Stages the boot-time filesystem (daemons, drivers, shell and init
 *  scripts) and archives it with redox-initfs-ar.
 *
 */

import { join } from "path"
import { mkdir, rm } from "fs/promises"
import { Logger } from "../../utils/log"
import { copyIfExists, treePath, writeFileWithMode } from "../../utils/files"
import type { CommandRunner } from "../../utils/run"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet } from "../../types/packages"
import { PCID_TOML, initfsScripts } from "../../files/initfs"
import { ION_INITRC } from "../../files/profile"
import type { ToolResolver } from "./disk-image"

const STAGING_DIRS = ["bin", "lib/drivers", "etc/init.d", "etc/pcid.d", "etc/ion", "usr/bin", "usr/lib/drivers"]

async function copyRequired(source: string, destination: string): Promise<void> {
    if (!(await copyIfExists(source, destination))) {
        throw new Error(`Required initfs file is missing: ${source}`)
    }
}

export async function stageInitfs(system: EvaluatedSystem, packages: PackageSet, dir: string): Promise<void> {
    const { config, plan } = system
    const base = join(packages.get("base").path, "bin")

    await rm(dir, { recursive: true, force: true })
    for (const sub of STAGING_DIRS) {
        await mkdir(join(dir, sub), { recursive: true })
    }

    for (const daemon of plan.allDaemons) {
        await copyIfExists(join(base, daemon), join(dir, "bin", daemon))
    }

    await copyRequired(join(base, "zerod"), join(dir, "bin", "nulld"))
    await copyRequired(join(packages.get("redoxfs").path, "bin", "redoxfs"), join(dir, "bin", "redoxfs"))

    const ion = join(packages.get("ion").path, "bin", "ion")
    for (const target of ["bin/ion", "usr/bin/ion", "bin/sh", "usr/bin/sh"]) {
        await copyRequired(ion, join(dir, target))
    }

    const netutils = packages.resolve("netutils")
    if (netutils) {
        for (const bin of ["ifconfig", "ping"]) {
            await copyIfExists(join(netutils.path, "bin", bin), join(dir, "bin", bin))
        }
    }

    const userutils = packages.resolve("userutils")
    if (userutils) {
        for (const bin of ["getty", "login"]) {
            await copyIfExists(join(userutils.path, "bin", bin), join(dir, "bin", bin))
        }
    }

    for (const driver of plan.allDrivers) {
        await copyIfExists(join(base, driver), join(dir, "lib", "drivers", driver))
    }

    if (plan.usbEnabled) {
        for (const driver of ["xhcid", "usbhubd", "usbhidd"]) {
            await copyIfExists(join(base, driver), join(dir, "lib", "drivers", driver))
        }
        for (const bin of ["usbhubd", "usbhidd"]) {
            await copyIfExists(join(base, bin), join(dir, "bin", bin))
            await copyIfExists(join(base, bin), join(dir, "usr", "lib", "drivers", bin))
        }
    }

    await writeFileWithMode(join(dir, "etc", "pcid.d", "initfs.toml"), PCID_TOML(plan))

    for (const [name, text] of initfsScripts(config, plan)) {
        await writeFileWithMode(treePath(dir, join("etc", "init.d", name)), text)
    }

    await writeFileWithMode(join(dir, "etc", "ion", "initrc"), ION_INITRC())
}

/**
 * Stages and archives the initfs, returning the path of the image
 */
export async function buildInitfs(
    system: EvaluatedSystem,
    packages: PackageSet,
    workDir: string,
    runner: CommandRunner,
    tool: ToolResolver,
): Promise<string> {
    const stagingDir = join(workDir, "initfs")
    const image = join(workDir, "initfs.img")

    await stageInitfs(system, packages, stagingDir)
    Logger.debug(`Initfs staged in ${stagingDir}`)

    const bootstrap = join(packages.get("bootstrap").path, "bin", "bootstrap")
    await runner.runCommand(tool("redox-initfs-ar"), [stagingDir, bootstrap, "-o", image], {
        message: "Archiving initfs...",
        messageOnSuccess: "Initfs archived",
        cwd: workDir,
    })

    return image
}
