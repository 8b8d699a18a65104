/***
 *
 *
 *  Build Command
 *
 *  Main entry point for the build pipeline:
 *
 *      evaluate → root tree → initfs → disk image → toplevel
 *
 *  Steps whose inputs did not change since the last run are skipped.
 *
 */

import { join } from "path"
import { rm } from "fs/promises"
import { Settings } from "../../settings"
import { Logger } from "../../utils/log"
import { Runner, type CommandRunner } from "../../utils/run"
import { loadProject, type ProjectOptions } from "../../config/project"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet } from "../../types/packages"
import { loadManifest } from "../system/manifest"
import type { Manifest } from "../../types/manifest"
import {
    computeStepDependencies,
    fingerprintPackages,
    loadBuildCacheManifest,
    shouldRebuildStep,
    updateStepCache,
    type BuildStep,
} from "./cache"
import { stageRootTree } from "./root-tree"
import { buildInitfs } from "./initfs"
import { assembleDiskImage, type ToolResolver } from "./disk-image"
import { computeBuildHash, createVersionInfo, isToplevelCached, toplevelPath, writeToplevel } from "./toplevel"

export interface BuildOptions extends ProjectOptions {
    clean?: boolean
}

export interface BuildContext {
    outputDir: string
    runner: CommandRunner
    tool: ToolResolver
    clean: boolean
}

export interface BuildResult {
    system: EvaluatedSystem
    buildHash: string
    toplevel: string
    cached: boolean
    manifest: Manifest
}

/**
 * Builds a system that has already been evaluated
 */
export async function buildSystem(system: EvaluatedSystem, packages: PackageSet, ctx: BuildContext): Promise<BuildResult> {
    const fingerprints = await fingerprintPackages(system, packages)
    const buildHash = computeBuildHash(system, packages, fingerprints)
    const toplevel = toplevelPath(ctx.outputDir, buildHash)
    const workDir = join(ctx.outputDir, "work")

    if (ctx.clean) {
        await rm(ctx.outputDir, { recursive: true, force: true })
    } else if (await isToplevelCached(toplevel, buildHash)) {
        Logger.cached(`System ${buildHash.slice(0, 12)} (no changes detected)`)
        return { system, buildHash, toplevel, cached: true, manifest: await loadManifest(join(toplevel, "root-tree")) }
    }

    const cache = await loadBuildCacheManifest(workDir)

    // Runs a step unless its cache entry is still valid
    async function step(name: BuildStep, run: () => Promise<void>): Promise<void> {
        const dependencies = computeStepDependencies(name, system, packages, fingerprints)
        const decision = shouldRebuildStep(name, cache, { clean: ctx.clean, workDir, dependencies })
        if (!decision.rebuild) {
            Logger.cached(`${name} (no changes detected)`)
            return
        }
        Logger.debug(`Rebuilding ${name}: ${decision.reason ?? "unknown reason"}`)
        await run()
        await updateStepCache(name, cache, { workDir, dependencies })
    }

    const rootTree = join(workDir, "root-tree")
    const initfs = join(workDir, "initfs.img")
    const kernel = join(packages.get(system.config.boot.kernel).path, "boot", "kernel")
    const bootloader = join(packages.get(system.config.boot.bootloader).path, "boot", "EFI", "BOOT", "BOOTX64.EFI")

    await step("root-tree", async () => {
        const result = await stageRootTree(system, packages, rootTree)
        Logger.success(`Root tree staged: ${result.fileCount} files, ${result.binaryCount} binaries`)
    })

    await step("initfs", async () => {
        await buildInitfs(system, packages, workDir, ctx.runner, ctx.tool)
    })

    const diskDir = join(workDir, "disk")
    await step("disk-image", async () => {
        await assembleDiskImage({
            kernel,
            bootloader,
            initfs,
            rootTree,
            workDir: diskDir,
            diskSizeMB: system.config.boot.diskSizeMB,
            espSizeMB: system.config.boot.espSizeMB,
        }, ctx.runner, ctx.tool)
        Logger.success(`Disk image assembled (${system.config.boot.diskSizeMB} MB)`)
    })

    await writeToplevel(toplevel, {
        diskImage: join(diskDir, "disk.img"),
        bootloader,
        kernel,
        initfs,
        rootTree,
    }, createVersionInfo(system, buildHash))

    return { system, buildHash, toplevel, cached: false, manifest: await loadManifest(rootTree) }
}

export function defaultBuildContext(clean = false): BuildContext {
    return {
        outputDir: Settings.outputDir,
        runner: Runner,
        tool: name => Settings.tool(name),
        clean,
    }
}

/**
 * Evaluates redox.yaml and builds the system
 */
export async function build(options: BuildOptions = {}): Promise<BuildResult> {
    const { system, packages } = await loadProject(options)

    Logger.info(`Profile: ${system.profile}, hostname: ${system.config.time.hostname}`)
    const result = await buildSystem(system, packages, defaultBuildContext(options.clean ?? false))

    Logger.success(`System ready: ${result.toplevel}`)
    return result
}

/**
 * Evaluates the configuration without building anything
 */
export async function check(options: ProjectOptions = {}): Promise<EvaluatedSystem> {
    const { system } = await loadProject(options)
    Logger.success(`Configuration is valid (profile ${system.profile}, ${system.plan.packages.length} packages, ${system.plan.allDrivers.length} drivers)`)
    return system
}
