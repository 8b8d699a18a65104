/***
 *
 *
 *  Root Tree
 *
 *  Stages the RedoxFS root filesystem: directories, device links, package
 *  binaries, generated files and finally the system manifest.
 *
 */

import { join, dirname } from "path"
import { mkdir, readdir, rm } from "fs/promises"
import { Logger } from "../../utils/log"
import { directoryExists } from "../../utils/path"
import { copyIfExists, forceSymlink, treePath, writeFileWithMode } from "../../utils/files"
import { sortedEntries } from "../../config/plan"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet } from "../../types/packages"
import { MANIFEST_PATH, serializeManifest, type Manifest } from "../../types/manifest"
import { generateFiles } from "./generated-files"
import { buildManifest } from "../system/manifest"

export interface RootTreeResult {
    path: string
    manifest: Manifest
    fileCount: number
    binaryCount: number
}

/**
 * Copies every file in a package's bin/ into both bin/ and usr/bin/ of the tree
 */
async function installPackageBinaries(packagePath: string, root: string): Promise<number> {
    const binDir = join(packagePath, "bin")
    if (!directoryExists(binDir)) return 0

    let copied = 0
    for (const name of (await readdir(binDir)).sort()) {
        const source = join(binDir, name)
        if (await copyIfExists(source, join(root, "bin", name))) {
            await copyIfExists(source, join(root, "usr", "bin", name))
            copied++
        }
    }
    return copied
}

export async function stageRootTree(system: EvaluatedSystem, packages: PackageSet, root: string): Promise<RootTreeResult> {
    const { config, plan } = system

    await rm(root, { recursive: true, force: true })
    await mkdir(root, { recursive: true })

    for (const dir of plan.allDirectories) {
        await mkdir(treePath(root, dir), { recursive: true })
    }

    await mkdir(join(root, "dev"), { recursive: true })
    for (const [name, target] of sortedEntries(config.filesystem.devSymlinks)) {
        await forceSymlink(target, treePath(root, join("dev", name)))
    }

    for (const [name, target] of sortedEntries(config.filesystem.specialSymlinks)) {
        const link = treePath(root, name)
        await mkdir(dirname(link), { recursive: true })
        await forceSymlink(target, link)
    }

    let binaryCount = 0
    for (const pkg of plan.packages) {
        const copied = await installPackageBinaries(pkg.path, root)
        Logger.debug(`Installed ${copied} binaries from ${pkg.name}`)
        binaryCount += copied
    }

    const generated = generateFiles(system, packages)
    for (const [path, file] of generated) {
        await writeFileWithMode(treePath(root, path), file.text, file.mode)
    }

    const manifest = await buildManifest(system, packages, root)
    await writeFileWithMode(join(root, MANIFEST_PATH), serializeManifest(manifest))

    const fileCount = Object.keys(manifest.files).length + 1
    Logger.debug(`Root tree: ${fileCount} files, ${binaryCount} binaries`)

    return { path: root, manifest, fileCount, binaryCount }
}
