/***
 *
 *
 *  Build Cache Management
 *
 *  Each build step records the hashes of its inputs and the artifacts it
 *  produced. A step reruns when:
 *  - a clean build is requested
 *  - it has never run or an artifact is missing
 *  - one of its input hashes changed
 *  - an upstream step ran after it
 *
 */

import { join } from "path"
import { mkdir, readFile, writeFile } from "fs/promises"
import { z } from "zod"
import { Logger } from "../../utils/log"
import { directoryExists, fileExists } from "../../utils/path"
import { collectFilesRecursively, hashContent } from "../../utils/files"
import { REDOX_FORGE_VERSION } from "../../version"
import type { EvaluatedSystem } from "../../config/evaluate"
import type { PackageSet, ResolvedPackage } from "../../types/packages"

// =========================================================================
// CACHE MANIFEST TYPES
// =========================================================================

export type BuildStep = "root-tree" | "initfs" | "disk-image"

const StepCacheEntrySchema = z.object({
    lastRun: z.string(),
    dependencies: z.record(z.string()),
    // Relative to the work directory, directories end with "/"
    artifacts: z.array(z.string()),
})

const BuildCacheManifestSchema = z.object({
    version: z.string(),
    forgeVersion: z.string().optional(),
    steps: z.object({
        "root-tree": StepCacheEntrySchema.optional(),
        "initfs": StepCacheEntrySchema.optional(),
        "disk-image": StepCacheEntrySchema.optional(),
    }),
})

export type StepCacheEntry = z.infer<typeof StepCacheEntrySchema>
export type BuildCacheManifest = z.infer<typeof BuildCacheManifestSchema>

const CACHE_MANIFEST_VERSION = "1.0"
const CACHE_FILE = ".build-cache.json"

export const STEP_ARTIFACTS: Record<BuildStep, string[]> = {
    "root-tree": ["root-tree/"],
    "initfs": ["initfs.img"],
    "disk-image": ["disk/disk.img"],
}

const UPSTREAM_STEPS: Record<BuildStep, BuildStep[]> = {
    "root-tree": [],
    "initfs": [],
    "disk-image": ["root-tree", "initfs"],
}

// =========================================================================
// MANIFEST I/O
// =========================================================================

function createEmptyManifest(): BuildCacheManifest {
    return { version: CACHE_MANIFEST_VERSION, forgeVersion: REDOX_FORGE_VERSION, steps: {} }
}

/**
 * Loads the cache manifest of a work directory.
 * Returns an empty manifest if the file doesn't exist or is invalid.
 */
export async function loadBuildCacheManifest(workDir: string): Promise<BuildCacheManifest> {
    const manifestPath = join(workDir, CACHE_FILE)
    if (!fileExists(manifestPath)) return createEmptyManifest()

    let raw: unknown
    try {
        raw = JSON.parse(await readFile(manifestPath, "utf-8"))
    } catch (err) {
        Logger.debug(`Failed to parse cache manifest, resetting cache: ${err instanceof Error ? err.message : String(err)}`)
        return createEmptyManifest()
    }

    const result = BuildCacheManifestSchema.safeParse(raw)
    if (!result.success || result.data.version !== CACHE_MANIFEST_VERSION) {
        Logger.debug("Cache manifest version mismatch, resetting cache")
        return createEmptyManifest()
    }

    if (result.data.forgeVersion !== REDOX_FORGE_VERSION) {
        Logger.debug("redox-forge version changed, invalidating all cached steps")
        return createEmptyManifest()
    }

    return result.data
}

export async function saveBuildCacheManifest(manifest: BuildCacheManifest, workDir: string): Promise<void> {
    await mkdir(workDir, { recursive: true })
    await writeFile(join(workDir, CACHE_FILE), JSON.stringify(manifest, null, 2))
}

// =========================================================================
// HASH COMPUTATION
// =========================================================================

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, item: unknown) => {
        if (typeof item !== "object" || item === null || Array.isArray(item)) return item
        return Object.fromEntries(Object.entries(item).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
    })
}

export function hashValue(value: unknown): string {
    return hashContent(canonicalJson(value))
}

// Packages the initfs takes binaries from
const INITFS_PACKAGES = ["base", "redoxfs", "ion", "netutils", "userutils", "bootstrap"]

// Content hash per package name
export type PackageFingerprints = Record<string, string>

function buildPackages(system: EvaluatedSystem, packages: PackageSet): ResolvedPackage[] {
    const names = [
        ...system.plan.packages.map(pkg => pkg.name),
        ...INITFS_PACKAGES,
        system.config.boot.kernel,
        system.config.boot.bootloader,
    ]
    const selected = new Map<string, ResolvedPackage>()
    for (const name of names) {
        const pkg = packages.resolve(name)
        if (pkg) selected.set(pkg.name, pkg)
    }
    return [...selected.values()]
}

/**
 * Hashes the files of every package a build reads, so a package rebuilt
 * in place invalidates the steps that use it
 */
export async function fingerprintPackages(system: EvaluatedSystem, packages: PackageSet): Promise<PackageFingerprints> {
    const fingerprints: PackageFingerprints = {}
    for (const pkg of buildPackages(system, packages)) {
        const files = directoryExists(pkg.path) ? await collectFilesRecursively(pkg.path) : []
        const contents: { path: string, mode: number, hash: string }[] = []
        for (const file of files) {
            contents.push({ path: file.path, mode: file.mode, hash: hashContent(await readFile(file.absolutePath)) })
        }
        fingerprints[pkg.name] = hashValue({ name: pkg.name, version: pkg.version, path: pkg.path, contents })
    }
    return fingerprints
}

function packageFingerprint(packages: PackageSet, fingerprints: PackageFingerprints, names: string[]): string {
    const selected = names.flatMap(name => {
        const pkg = packages.resolve(name)
        return pkg ? [{ name: pkg.name, content: fingerprints[pkg.name] ?? null }] : []
    })
    return hashValue(selected)
}

/**
 * Input hashes of a build step
 */
export function computeStepDependencies(
    step: BuildStep,
    system: EvaluatedSystem,
    packages: PackageSet,
    fingerprints: PackageFingerprints,
): Record<string, string> {
    const { config, plan } = system

    switch (step) {
        case "root-tree":
            return {
                "config": hashValue({ profile: system.profile, config }),
                "packages": packageFingerprint(packages, fingerprints, plan.packages.map(pkg => pkg.name)),
            }
        case "initfs":
            return {
                "initfs": hashValue({
                    allDaemons: plan.allDaemons,
                    allDrivers: plan.allDrivers,
                    pcidDrivers: plan.pcidDrivers,
                    usbEnabled: plan.usbEnabled,
                    initfsEnableGraphics: plan.initfsEnableGraphics,
                    defaultUser: plan.defaultUser,
                    userutilsInstalled: plan.userutilsInstalled,
                    variables: config.environment.variables,
                    services: config.services.services,
                }),
                "packages": packageFingerprint(packages, fingerprints, INITFS_PACKAGES),
            }
        case "disk-image":
            return {
                "boot": hashValue(config.boot),
                "packages": packageFingerprint(packages, fingerprints, [config.boot.kernel, config.boot.bootloader]),
            }
    }
}

// =========================================================================
// CACHE DECISION LOGIC
// =========================================================================

export interface RebuildDecision {
    rebuild: boolean
    reason?: string
}

export function shouldRebuildStep(
    step: BuildStep,
    manifest: BuildCacheManifest,
    options: {
        clean?: boolean
        workDir: string
        dependencies: Record<string, string>
    },
): RebuildDecision {
    const { clean = false, workDir, dependencies } = options

    if (clean) {
        return { rebuild: true, reason: "clean build requested" }
    }

    const cached = manifest.steps[step]
    if (!cached) {
        return { rebuild: true, reason: "no cache entry" }
    }

    for (const artifact of STEP_ARTIFACTS[step]) {
        const artifactPath = join(workDir, artifact)
        const present = artifact.endsWith("/") ? directoryExists(artifactPath) : fileExists(artifactPath)
        if (!present) {
            return { rebuild: true, reason: `artifact missing: ${artifact}` }
        }
    }

    for (const [key, hash] of Object.entries(dependencies)) {
        if (cached.dependencies[key] !== hash) {
            return { rebuild: true, reason: `dependency changed: ${key}` }
        }
    }

    for (const key of Object.keys(cached.dependencies)) {
        if (!(key in dependencies)) {
            return { rebuild: true, reason: `dependency removed: ${key}` }
        }
    }

    for (const upstream of UPSTREAM_STEPS[step]) {
        const upstreamCached = manifest.steps[upstream]
        if (!upstreamCached) {
            return { rebuild: true, reason: `upstream step not cached: ${upstream}` }
        }
        if (new Date(upstreamCached.lastRun) > new Date(cached.lastRun)) {
            return { rebuild: true, reason: `upstream step rebuilt: ${upstream}` }
        }
    }

    return { rebuild: false }
}

/**
 * Records a finished step and saves the manifest
 */
export async function updateStepCache(
    step: BuildStep,
    manifest: BuildCacheManifest,
    options: {
        workDir: string
        dependencies: Record<string, string>
        now?: Date
    },
): Promise<void> {
    manifest.steps[step] = {
        lastRun: (options.now ?? new Date()).toISOString(),
        dependencies: options.dependencies,
        artifacts: STEP_ARTIFACTS[step],
    }
    await saveBuildCacheManifest(manifest, options.workDir)
}
