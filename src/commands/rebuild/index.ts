/***
 *
 *
 *  Rebuild Command
 *
 *  Build, run and test a profile while keeping a numbered history of the
 *  resulting toplevels, with diff and rollback between them.
 *
 */

import { join } from "path"
import { readFile, realpath } from "fs/promises"
import { start } from "repl"
import chalk from "chalk"
import { Command } from "commander"
import { z } from "zod"
import { Logger } from "../../utils/log"
import { Settings } from "../../settings"
import { Runner } from "../../utils/run"
import { loadProject } from "../../config/project"
import { PROFILES, PROFILE_ALIASES } from "../../config/profiles"
import { build, check } from "../build"
import { computeBuildHash, createVersionInfo, readVersionInfo } from "../build/toplevel"
import { fingerprintPackages } from "../build/cache"
import { bootTest } from "../test"
import { Launcher } from "../test/vmm"
import { run } from "../run"
import { diffToplevels, printToplevelDiff } from "./diff"
import {
    GenerationNotFoundError,
    currentGeneration,
    generationsDirFromEnv,
    listGenerationLinks,
    recordGeneration,
    rollbackGeneration,
    type GenerationLink,
} from "./generations"

export const REBUILD_ACTIONS = [
    "build",
    "run",
    "test",
    "diff",
    "check",
    "list-generations",
    "rollback",
    "repl",
    "edit",
    "changelog",
    "version",
] as const

export type RebuildAction = typeof REBUILD_ACTIONS[number]

export function isRebuildAction(name: string): name is RebuildAction {
    return REBUILD_ACTIONS.some(action => action === name)
}

export interface RebuildOptions {
    // Falls back to the profile of redox.yaml
    profile?: string
    json: boolean
    // Generation number for rollback, otherwise everything after `--`
    extraArgs: string[]
}

/**
 * Sorts the words after the action the way `rebuild` reads them: a profile,
 * except for rollback where it is the generation number.
 */
export function rebuildOptions(
    action: RebuildAction,
    positional: string | undefined,
    extra: string[],
    flags: { profileName?: string, json?: boolean },
): RebuildOptions {
    // Words after `--` arrive as positionals too
    if (positional?.startsWith("-")) {
        return rebuildOptions(action, undefined, [positional, ...extra], flags)
    }

    const takesProfile = action === "build" || action === "run" || action === "test" || action === "diff" || action === "check"
    if (positional !== undefined && !takesProfile && action !== "rollback") {
        throw new Error(`${action} takes no positional argument`)
    }

    return {
        profile: flags.profileName ?? (takesProfile ? positional : undefined),
        json: flags.json ?? false,
        extraArgs: action === "rollback" && positional !== undefined ? [positional, ...extra] : extra,
    }
}

function profileLabel(options: RebuildOptions): string {
    return options.profile ?? Settings.activeProfile
}

const NO_GENERATION = "No current generation. Build first with: redox-forge rebuild build"

// =========================================================================
// GENERATIONS
// =========================================================================

function pad(value: number): string {
    return String(value).padStart(2, "0")
}

// Local time, "2026-03-01 14:05"
export function formatGenerationDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`
}

// Local time, "2026-03-01T14:05:09"
export function formatGenerationTimestamp(date: Date): string {
    return `${formatGenerationDate(date).replace(" ", "T")}:${pad(date.getSeconds())}`
}

async function buildAndRecord(options: RebuildOptions): Promise<string> {
    Logger.info(`Building system configuration (profile: ${profileLabel(options)})...`)
    const result = await build({ profile: options.profile })

    const update = await recordGeneration(generationsDirFromEnv(Settings.projectPath), result.toplevel)
    if (update.created) {
        Logger.success(`Generation ${update.number} created.`)
        Logger.plain(`  ${update.toplevel}`)
    } else {
        Logger.warning("No change from current generation.")
    }
    return update.toplevel
}

export interface GenerationRow {
    generation: number
    date: string
    current: boolean
    toplevel: string
    packageCount: number | null
    hostname: string | null
}

export async function generationRows(links: GenerationLink[], current: string | null, timestamps = false): Promise<GenerationRow[]> {
    const rows: GenerationRow[] = []
    for (const link of links) {
        const info = await readVersionInfo(link.toplevel)
        rows.push({
            generation: link.number,
            date: timestamps ? formatGenerationTimestamp(link.date) : formatGenerationDate(link.date),
            current: link.toplevel === current,
            toplevel: link.toplevel,
            packageCount: info?.packageCount ?? null,
            hostname: info?.hostname ?? null,
        })
    }
    return rows
}

export function generationTable(rows: GenerationRow[]): string[] {
    const line = (gen: string, date: string, current: string, pkgs: string, hostname: string, toplevel: string) =>
        `${gen.padEnd(5)}  ${date.padEnd(20)}  ${current.padEnd(8)}  ${pkgs.padEnd(8)}  ${hostname.padEnd(10)}  ${toplevel}`

    return [
        chalk.bold(line("Gen", "Date", "Current", "Pkgs", "Hostname", "Toplevel")),
        ...rows.map(row => line(
            String(row.generation),
            row.date,
            row.current ? "*" : "",
            row.packageCount === null ? "?" : String(row.packageCount),
            row.hostname ?? "?",
            row.toplevel,
        )),
    ]
}

async function listGenerations(options: RebuildOptions): Promise<void> {
    const dir = generationsDirFromEnv(Settings.projectPath)
    const links = await listGenerationLinks(dir)
    const current = await currentGeneration(dir)

    if (options.json) {
        const entries = []
        for (const row of await generationRows(links, current, true)) {
            entries.push({
                generation: row.generation,
                date: row.date,
                current: row.current,
                toplevel: row.toplevel,
                version: (await readVersionInfo(row.toplevel)) ?? {},
            })
        }
        Logger.plain(JSON.stringify(entries, null, 2))
        return
    }

    if (links.length === 0) {
        Logger.plain("No generations. Build first with: redox-forge rebuild build")
        return
    }
    for (const line of generationTable(await generationRows(links, current))) {
        Logger.plain(line)
    }
}

async function rollback(options: RebuildOptions): Promise<void> {
    const [requested] = options.extraArgs
    let target: number | undefined
    if (requested !== undefined) {
        target = Number(requested)
        if (!Number.isInteger(target) || target < 1) throw new Error(`Invalid generation number: ${requested}`)
    }

    try {
        const chosen = await rollbackGeneration(generationsDirFromEnv(Settings.projectPath), target)
        Logger.success(target === undefined ? `Rolled back to generation ${chosen.number}.` : `Switched to generation ${chosen.number}.`)
        Logger.plain(`  ${chosen.toplevel}`)
    } catch (err) {
        if (err instanceof GenerationNotFoundError) {
            const available = err.available.map(number => `  ${number}`).join("\n")
            throw new Error(`${err.message}\nAvailable generations:\n${available}`)
        }
        throw err
    }
}

// =========================================================================
// ACTIONS
// =========================================================================

const TestArgsSchema = z.object({
    qemu: z.boolean().optional(),
    ch: z.boolean().optional(),
    timeout: z.coerce.number().int().positive().optional(),
    verbose: z.boolean().optional(),
})

/**
 * Options of the boot test given after `--`, e.g. `rebuild test -- --qemu --timeout 120`
 */
export function parseTestArgs(args: string[]): z.infer<typeof TestArgsSchema> {
    const parser = new Command()
        .exitOverride()
        .option("--qemu")
        .option("--ch")
        .option("--timeout <seconds>")
        .option("--verbose")
        .parse(args, { from: "user" })
    return TestArgsSchema.parse(parser.opts())
}

async function diff(options: RebuildOptions): Promise<void> {
    const dir = generationsDirFromEnv(Settings.projectPath)
    const current = await currentGeneration(dir)
    if (current === null) throw new Error(NO_GENERATION)

    Logger.info(`Building new configuration for diff (profile: ${profileLabel(options)})...`)
    const result = await build({ profile: options.profile })

    if (await realpath(result.toplevel) === current) {
        Logger.success("No changes. Current system is up to date.")
        return
    }
    printToplevelDiff(await diffToplevels(current, result.toplevel, Runner), current, result.toplevel)
}

async function repl(options: RebuildOptions): Promise<void> {
    const { system } = await loadProject({ profile: options.profile })

    Logger.info("Loading system configuration into repl...")
    Logger.plain("Available:")
    Logger.plain("  config    evaluated module configuration")
    Logger.plain("  plan      derived build plan")
    Logger.plain("  profiles  built-in profiles")
    Logger.plain()

    const server = start({ prompt: "redox> " })
    Object.assign(server.context, {
        config: system.config,
        plan: system.plan,
        profiles: { ...PROFILES, ...Object.fromEntries(Object.entries(PROFILE_ALIASES).map(([alias, name]) => [alias, PROFILES[name]])) },
    })
    await new Promise<void>(resolve => server.on("exit", () => resolve()))
}

async function edit(): Promise<number> {
    const editor = process.env.EDITOR ?? "vi"
    return Launcher.launch(editor, [Settings.projectFile], null).exited
}

async function changelog(): Promise<void> {
    const result = await Runner.runCommand("git", [
        "-C", Settings.projectPath,
        "log", "--oneline", "--color=always", "-20",
        "--", Settings.projectFile,
    ], { message: "Reading project history", quiet: true })

    Logger.plain(chalk.bold("Recent configuration changes:"))
    Logger.plain()
    Logger.plain(result.stdout.trimEnd())
}

async function version(options: RebuildOptions): Promise<void> {
    const current = await currentGeneration(generationsDirFromEnv(Settings.projectPath))

    if (current === null) {
        Logger.warning(NO_GENERATION)
        Logger.info("Evaluating current configuration...")
        const { system, packages } = await loadProject({ profile: options.profile })
        const buildHash = computeBuildHash(system, packages, await fingerprintPackages(system, packages))
        Logger.plain(JSON.stringify(createVersionInfo(system, buildHash), null, 2))
        return
    }

    const content = await readFile(join(current, "version.json"), "utf-8")
    if (options.json) {
        Logger.plain(content.trimEnd())
        return
    }
    Logger.plain(`${chalk.bold("Current system:")} ${current}`)
    Logger.plain()
    Logger.plain(JSON.stringify(JSON.parse(content), null, 2))
}

/**
 * Runs one action and returns the process exit code
 */
export async function rebuild(action: RebuildAction, options: RebuildOptions): Promise<number> {
    switch (action) {
        case "build": {
            Logger.plain(await buildAndRecord(options))
            return 0
        }
        case "run": {
            await buildAndRecord(options)
            Logger.info("Launching VM...")
            return run({ profile: options.profile, extraArgs: options.extraArgs })
        }
        case "test": {
            await buildAndRecord(options)
            Logger.info("Running boot test...")
            return await bootTest({ profile: options.profile, ...parseTestArgs(options.extraArgs) }) ? 0 : 1
        }
        case "diff":
            await diff(options)
            return 0
        case "check":
            Logger.info(`Checking system configuration (profile: ${profileLabel(options)})...`)
            await check({ profile: options.profile })
            Logger.success("All assertions and system checks passed.")
            return 0
        case "list-generations":
            await listGenerations(options)
            return 0
        case "rollback":
            await rollback(options)
            return 0
        case "repl":
            await repl(options)
            return 0
        case "edit":
            return edit()
        case "changelog":
            await changelog()
            return 0
        case "version":
            await version(options)
            return 0
    }
}
