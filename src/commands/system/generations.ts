/***
 *
 *
 *  System Generations
 *
 *  Every switch stores the outgoing and incoming manifests under
 *  etc/redox-system/generations/<id>/manifest.json, so any earlier system
 *  description can be reinstalled with a rollback.
 *
 */

import { join } from "path"
import { mkdir, readdir, writeFile } from "fs/promises"
import { Logger } from "../../utils/log"
import { directoryExists, fileExists } from "../../utils/path"
import { GENERATIONS_DIR, MANIFEST_PATH, serializeManifest, type Manifest } from "../../types/manifest"
import { loadManifestFile } from "./manifest"

export interface SystemPaths {
    root: string
    manifestPath: string
    generationsDir: string
}

export interface StoredGeneration {
    id: number
    manifest: Manifest
    path: string
}

export interface GenerationChange {
    id: number
    lines: string[]
}

export function systemPaths(root: string): SystemPaths {
    return {
        root,
        manifestPath: join(root, MANIFEST_PATH),
        generationsDir: join(root, GENERATIONS_DIR),
    }
}

export function formatTimestamp(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, "Z")
}

/**
 * Reads stored generations, ordered by id. Unreadable entries are skipped with a warning.
 */
export async function scanGenerations(dir: string): Promise<StoredGeneration[]> {
    if (!directoryExists(dir)) return []

    const generations: StoredGeneration[] = []
    for (const name of await readdir(dir)) {
        if (!/^\d+$/.test(name)) continue
        const path = join(dir, name, "manifest.json")
        if (!fileExists(path)) continue

        try {
            generations.push({ id: Number(name), manifest: await loadManifestFile(path), path })
        } catch (err) {
            Logger.warning(`skipping generation ${name}: ${err instanceof Error ? err.message : String(err)}`)
        }
    }

    return generations.sort((a, b) => a.id - b.id)
}

export function nextGenerationId(generations: StoredGeneration[], current: Manifest): number {
    const maxStored = generations.reduce((max, gen) => Math.max(max, gen.id), 0)
    return Math.max(maxStored, current.generation.id) + 1
}

async function storeGeneration(dir: string, manifest: Manifest): Promise<string> {
    const genDir = join(dir, String(manifest.generation.id))
    await mkdir(genDir, { recursive: true })
    const path = join(genDir, "manifest.json")
    await writeFile(path, serializeManifest(manifest))
    return path
}

function packageNames(manifest: Manifest): Set<string> {
    return new Set(manifest.packages.map(pkg => pkg.name))
}

export function packageChanges(from: Manifest, to: Manifest): { added: string[], removed: string[] } {
    const before = packageNames(from)
    const after = packageNames(to)
    return {
        added: [...after].filter(name => !before.has(name)).sort(),
        removed: [...before].filter(name => !after.has(name)).sort(),
    }
}

export async function listGenerations(paths: SystemPaths): Promise<string[]> {
    const generations = await scanGenerations(paths.generationsDir)
    const current = fileExists(paths.manifestPath) ? await loadManifestFile(paths.manifestPath) : null

    if (generations.length === 0 && !current) {
        return [
            "No generations found.",
            "Hint: generations are created when you run 'redox-forge system switch'.",
        ]
    }

    const row = (id: string, marker: string, manifest: Manifest, suffix = ""): string => [
        `${id.padStart(4)}${marker.padEnd(2)}`,
        manifest.system.redoxSystemVersion.padStart(6),
        String(manifest.packages.length).padStart(4),
        String(manifest.drivers.all.length).padStart(4),
        (manifest.generation.timestamp || "-").padEnd(20),
        `${manifest.generation.description}${suffix}`,
    ].join("  ")

    const lines = [
        "System Generations",
        "==================",
        "",
        `${"Gen".padStart(4)}    ${"Ver".padStart(6)}  ${"Pkgs".padStart(4)}  ${"Drvs".padStart(4)}  ${"Timestamp".padEnd(20)}  Description`,
        "-".repeat(74),
    ]

    for (const gen of generations) {
        const marker = current?.generation.id === gen.id ? " *" : ""
        lines.push(row(String(gen.id), marker, gen.manifest))
    }

    if (current && !generations.some(gen => gen.id === current.generation.id)) {
        lines.push(row(String(current.generation.id), " *", current, " (current, not yet saved)"))
    }

    lines.push("")
    if (current) {
        lines.push(`Current generation: ${current.generation.id}`)
    }
    lines.push(`Generations stored: ${generations.length}`)

    return lines
}

/**
 * Installs a new manifest as the current system, storing both the old and the new one
 */
export async function switchGeneration(
    paths: SystemPaths,
    newManifestPath: string,
    options: { description?: string, now?: Date } = {},
): Promise<GenerationChange> {
    const current = await loadManifestFile(paths.manifestPath)
    const incoming = await loadManifestFile(newManifestPath)
    const generations = await scanGenerations(paths.generationsDir)
    const lines: string[] = []

    const id = nextGenerationId(generations, current)
    const next: Manifest = {
        ...incoming,
        generation: {
            ...incoming.generation,
            id,
            timestamp: formatTimestamp(options.now ?? new Date()),
            description: options.description ?? incoming.generation.description,
        },
    }

    if (!directoryExists(join(paths.generationsDir, String(current.generation.id)))) {
        await storeGeneration(paths.generationsDir, current)
        lines.push(`Saved current system as generation ${current.generation.id}`)
    }

    await storeGeneration(paths.generationsDir, next)
    await writeFile(paths.manifestPath, serializeManifest(next))
    lines.push(`Switched to generation ${id}`)

    const { added, removed } = packageChanges(current, next)
    if (added.length > 0 || removed.length > 0) {
        lines.push("")
        if (added.length > 0) lines.push(`Packages added:   ${added.join(", ")}`)
        if (removed.length > 0) lines.push(`Packages removed: ${removed.join(", ")}`)
    }

    if (current.system.redoxSystemVersion !== next.system.redoxSystemVersion) {
        lines.push(`Version: ${current.system.redoxSystemVersion} -> ${next.system.redoxSystemVersion}`)
    }

    return { id, lines }
}

/**
 * Reinstalls a stored generation. Without a target, picks the newest one older than the current system.
 * Returns a null id when the target already is the current generation.
 */
export async function rollbackGeneration(
    paths: SystemPaths,
    targetId?: number,
    options: { now?: Date } = {},
): Promise<{ id: number | null, lines: string[] }> {
    const current = await loadManifestFile(paths.manifestPath)
    const generations = await scanGenerations(paths.generationsDir)

    if (generations.length === 0) {
        throw new Error("No previous generations found. Nothing to roll back to.")
    }

    let target: StoredGeneration | undefined
    if (targetId !== undefined) {
        target = generations.find(gen => gen.id === targetId)
        if (!target) {
            throw new Error(`Generation ${targetId} not found. Available: ${generations.map(gen => gen.id).join(", ")}`)
        }
    } else {
        target = [...generations].reverse().find(gen => gen.id < current.generation.id)
            ?? generations[generations.length - 1]
    }

    if (target.id === current.generation.id) {
        return { id: null, lines: [`Already at generation ${target.id}. Nothing to do.`] }
    }

    const lines = [`Rolling back from generation ${current.generation.id} to generation ${target.id}...`, ""]

    const { added, removed } = packageChanges(current, target.manifest)
    if (added.length > 0) lines.push(`Packages restored: ${added.join(", ")}`)
    if (removed.length > 0) lines.push(`Packages removed:  ${removed.join(", ")}`)

    if (current.system.redoxSystemVersion !== target.manifest.system.redoxSystemVersion) {
        lines.push(`Version: ${current.system.redoxSystemVersion} -> ${target.manifest.system.redoxSystemVersion}`)
    }

    if (!directoryExists(join(paths.generationsDir, String(current.generation.id)))) {
        await storeGeneration(paths.generationsDir, current)
    }

    const id = nextGenerationId(generations, current)
    const rolledBack: Manifest = {
        ...target.manifest,
        generation: {
            ...target.manifest.generation,
            id,
            timestamp: formatTimestamp(options.now ?? new Date()),
            description: `rollback to generation ${target.id}`,
        },
    }

    await storeGeneration(paths.generationsDir, rolledBack)
    await writeFile(paths.manifestPath, serializeManifest(rolledBack))

    lines.push("", `Rolled back to generation ${target.id} (saved as generation ${id})`)
    return { id, lines }
}
