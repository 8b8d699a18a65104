/***
 *
 *
 *  Manifest Builder
 *
 *  Captures the identity, configuration and file inventory of a staged
 *  root tree.
 *
 */

import { join } from "path"
import { readFile } from "fs/promises"
import { REDOX_SYSTEM_VERSION, REDOX_TARGET } from "../../version"
import { collectFilesRecursively, formatMode, hashContent } from "../../utils/files"
import { fileExists } from "../../utils/path"
import { sortedEntries, userHome } from "../../config/plan"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet } from "../../types/packages"
import { GENERATIONS_DIR, MANIFEST_PATH, parseManifest, type FileInfo, type Manifest } from "../../types/manifest"
import { collectInitScripts } from "../build/generated-files"

export const MANIFEST_VERSION = 1

/**
 * Paths the inventory never tracks: the manifest itself and stored generations
 */
export function isUntrackedPath(relativePath: string): boolean {
    return relativePath === MANIFEST_PATH
        || relativePath === GENERATIONS_DIR
        || relativePath.startsWith(`${GENERATIONS_DIR}/`)
}

/**
 * Hashes every regular file below root, keyed by relative path
 */
export async function computeFileInventory(root: string): Promise<Record<string, FileInfo>> {
    const files: Record<string, FileInfo> = {}
    for (const entry of await collectFilesRecursively(root, isUntrackedPath)) {
        files[entry.path] = {
            hash: hashContent(await readFile(entry.absolutePath)),
            size: entry.size,
            mode: formatMode(entry.mode),
        }
    }
    return files
}

/**
 * Content hash of a file inventory, stable across builds of the same tree
 */
export function inventoryHash(files: Record<string, FileInfo>): string {
    const lines = sortedEntries(files).map(([path, info]) => `${path} ${info.hash} ${info.mode}`)
    return hashContent(lines.join("\n"))
}

export async function buildManifest(system: EvaluatedSystem, packages: PackageSet, root: string): Promise<Manifest> {
    const { config, plan, profile } = system
    const files = await computeFileInventory(root)

    const users: Manifest["users"] = {}
    for (const [name, user] of sortedEntries(config.users.users)) {
        users[name] = { uid: user.uid, gid: user.gid, home: userHome(name, user), shell: user.shell }
    }

    const groups: Manifest["groups"] = {}
    for (const [name, group] of sortedEntries(config.users.groups)) {
        groups[name] = { gid: group.gid, members: [...group.members] }
    }

    return {
        manifestVersion: MANIFEST_VERSION,
        system: {
            redoxSystemVersion: REDOX_SYSTEM_VERSION,
            target: REDOX_TARGET,
            profile,
            hostname: config.time.hostname,
            timezone: config.time.timezone,
        },
        generation: {
            id: 1,
            buildHash: inventoryHash(files),
            description: "initial build",
            timestamp: "",
        },
        configuration: {
            boot: {
                diskSizeMB: config.boot.diskSizeMB,
                espSizeMB: config.boot.espSizeMB,
            },
            hardware: {
                storageDrivers: config.hardware.storageDrivers,
                networkDrivers: config.hardware.networkDrivers,
                graphicsDrivers: config.hardware.graphicsDrivers,
                audioDrivers: config.hardware.audioDrivers,
                usbEnabled: plan.usbEnabled,
            },
            networking: {
                enabled: config.networking.enable,
                mode: config.networking.mode,
                dns: config.networking.dns,
            },
            graphics: {
                enabled: config.graphics.enable,
                resolution: config.graphics.resolution,
            },
            security: {
                protectKernelSchemes: config.security.protectKernelSchemes,
                requirePasswords: config.security.requirePasswords,
                allowRemoteRoot: config.security.allowRemoteRoot,
            },
            logging: {
                logLevel: config.logging.level,
                kernelLogLevel: config.logging.kernelLogLevel,
                logToFile: config.logging.logToFile,
                maxLogSizeMB: config.logging.maxLogSizeMB,
            },
            power: {
                acpiEnabled: config.power.acpiEnable,
                powerAction: config.power.powerAction,
                rebootOnPanic: config.power.rebootOnPanic,
            },
        },
        packages: plan.packages.map(pkg => ({ name: pkg.name, version: pkg.version, storePath: pkg.path })),
        drivers: {
            all: plan.allDrivers,
            initfs: plan.initfsDaemons,
            core: plan.coreDaemons,
        },
        users,
        groups,
        services: {
            initScripts: Object.keys(collectInitScripts(system, packages)).sort(),
            startupScript: config.services.startupScriptEnable ? "/startup.sh" : "",
        },
        files,
        systemProfile: "",
    }
}

/**
 * Reads the manifest installed in a root directory
 */
export async function loadManifest(root: string): Promise<Manifest> {
    const path = join(root, MANIFEST_PATH)
    if (!fileExists(path)) {
        throw new Error(`No system manifest found at ${path}. Was this system built with redox-forge?`)
    }
    return parseManifest(await readFile(path, "utf-8"), path)
}

export async function loadManifestFile(path: string): Promise<Manifest> {
    if (!fileExists(path)) {
        throw new Error(`Manifest not found: ${path}`)
    }
    return parseManifest(await readFile(path, "utf-8"), path)
}
