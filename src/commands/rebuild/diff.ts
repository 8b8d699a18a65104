/***
 *
 *
 *  Toplevel Diff
 *
 *  Compares the current generation against a new build: version.json,
 *  the root tree file list and the generated configuration files.
 *
 */

import { join } from "path"
import chalk from "chalk"
import { Logger } from "../../utils/log"
import { collectFilesRecursively } from "../../utils/files"
import { directoryExists, fileExists } from "../../utils/path"
import type { CommandRunner } from "../../utils/run"
import { readVersionInfo, type VersionInfo } from "../build/toplevel"

export const CONFIG_FILES = [
    "etc/passwd",
    "etc/group",
    "etc/profile",
    "etc/hostname",
    "etc/init.toml",
    "startup.sh",
]

export type ConfigFileChange =
    | { path: string, kind: "added" }
    | { path: string, kind: "removed" }
    | { path: string, kind: "changed", diff: string }

export interface ToplevelDiff {
    version: string[]
    files: { added: string[], removed: string[] }
    config: ConfigFileChange[]
}

export function versionChanges(older: VersionInfo | null, newer: VersionInfo | null): string[] {
    if (older === null || newer === null) {
        return older === newer ? [] : ["version.json missing on one side"]
    }

    const before = new Map<string, unknown>(Object.entries(older))
    return Object.entries(newer)
        .filter(([key, value]) => before.get(key) !== value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, value]) => `${key}: ${String(before.get(key))} -> ${String(value)}`)
}

export async function rootTreeFiles(rootTree: string): Promise<string[]> {
    if (!directoryExists(rootTree)) return []
    return (await collectFilesRecursively(rootTree)).map(entry => entry.path)
}

export function fileListChanges(before: string[], after: string[]): { added: string[], removed: string[] } {
    const old = new Set(before)
    const current = new Set(after)
    return {
        added: after.filter(path => !old.has(path)).sort(),
        removed: before.filter(path => !current.has(path)).sort(),
    }
}

/**
 * Runs `diff -u` on each configuration file present in either tree
 */
export async function configFileChanges(oldRoot: string, newRoot: string, runner: CommandRunner): Promise<ConfigFileChange[]> {
    const changes: ConfigFileChange[] = []

    for (const path of CONFIG_FILES) {
        const before = join(oldRoot, path)
        const after = join(newRoot, path)
        const inOld = fileExists(before)
        const inNew = fileExists(after)

        if (inOld && inNew) {
            const result = await runner.runCommand("diff", ["-u", before, after], {
                message: `Comparing ${path}`,
                allowFailure: true,
                quiet: true,
            })
            // diff exits 1 on differences and 2 on trouble
            if (result.exitCode === 2) throw new Error(`diff failed on ${path}: ${result.stderr.trim()}`)
            if (result.exitCode === 1) changes.push({ path, kind: "changed", diff: result.stdout })
        } else if (inNew) {
            changes.push({ path, kind: "added" })
        } else if (inOld) {
            changes.push({ path, kind: "removed" })
        }
    }

    return changes
}

export async function diffToplevels(older: string, newer: string, runner: CommandRunner): Promise<ToplevelDiff> {
    const oldRoot = join(older, "root-tree")
    const newRoot = join(newer, "root-tree")

    return {
        version: versionChanges(await readVersionInfo(older), await readVersionInfo(newer)),
        files: fileListChanges(await rootTreeFiles(oldRoot), await rootTreeFiles(newRoot)),
        config: await configFileChanges(oldRoot, newRoot, runner),
    }
}

export function printToplevelDiff(diff: ToplevelDiff, older: string, newer: string): void {
    Logger.plain()
    Logger.plain(chalk.bold("=== Version Changes ==="))
    for (const line of diff.version) Logger.plain(`  ${line}`)

    Logger.plain()
    Logger.plain(chalk.bold("=== Root Tree File Changes ==="))
    for (const path of diff.files.added) Logger.plain(chalk.green(`+ ${path}`))
    for (const path of diff.files.removed) Logger.plain(chalk.red(`- ${path}`))

    Logger.plain()
    Logger.plain(chalk.bold("=== Config File Changes ==="))
    for (const change of diff.config) {
        if (change.kind === "added") {
            Logger.plain(chalk.green(`+++ ${change.path} (new)`))
        } else if (change.kind === "removed") {
            Logger.plain(chalk.red(`--- ${change.path} (removed)`))
        } else {
            Logger.plain(chalk.yellow(`--- ${change.path}`))
            Logger.plain(change.diff.trimEnd())
            Logger.plain()
        }
    }

    Logger.plain()
    Logger.plain(`${chalk.bold("Old:")} ${older}`)
    Logger.plain(`${chalk.bold("New:")} ${newer}`)
}
