/***
 *
 *
 *  Main Entry Point for the Application
 *
 */

import { resolve } from "path"
import { Command, Option } from "commander"
import { Settings } from "./settings"
import { Logger } from "./utils/log"
import { PROFILES, PROFILE_ALIASES } from "./config/profiles"
import { build, check } from "./commands/build"
import { bootTest, functionalTest, bridgeTest, type VmCommandOptions } from "./commands/test"
import { run } from "./commands/run"
import { serveBridge, submitBridge } from "./commands/bridge"
import { isRebuildAction, rebuild, rebuildOptions, REBUILD_ACTIONS } from "./commands/rebuild"
import {
    systemDiff,
    systemGenerations,
    systemInfo,
    systemRollback,
    systemSwitch,
    systemVerify,
} from "./commands/system"

function failed(what: string, err: unknown): never {
    Logger.error(`${what} failed: ${err instanceof Error ? err.message : String(err)}`)
    if (Settings.showTrace && err instanceof Error && err.stack) {
        Logger.raw(err.stack)
    }
    process.exit(1)
}

function parseInteger(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed)) throw new Error(`not an integer: ${value}`)
    return parsed
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value]
}

const program = new Command()

program
    .name("redox-forge")
    .description("Declarative build, boot-test and rebuild tooling for RedoxOS systems")
    .version(Settings.forgeVersion)
    .option("--verbose", "Enable verbose output")
    .option("--show-trace", "Print stack traces on failure")
    .option("--project <dir>", "Directory containing redox.yaml")
    .hook("preAction", (thisCommand) => {
        const opts = thisCommand.opts()
        if (opts.verbose) Settings.verbose = true
        if (opts.showTrace) Settings.showTrace = true
        if (typeof opts.project === "string") Settings.projectPath = resolve(opts.project)
    })

// =========================================================================
// BUILD
// =========================================================================

program.command("build")
    .description("Build the disk image and toplevel for a profile")
    .option("-p, --profile <name>", "Profile to build (default: from redox.yaml)")
    .option("--set <path=value>", "Override a module option, repeatable", collect, [])
    .option("--clean", "Discard cached build steps first")
    .action(async (options: { profile?: string, set: string[], clean?: boolean }) => {
        try {
            Logger.title("Building RedoxOS System")
            await build(options)
        } catch (err) {
            failed("Build", err)
        }
    })

program.command("check")
    .description("Evaluate the configuration and run all assertions")
    .option("-p, --profile <name>", "Profile to check")
    .option("--set <path=value>", "Override a module option, repeatable", collect, [])
    .action(async (options: { profile?: string, set: string[] }) => {
        try {
            await check(options)
        } catch (err) {
            failed("Check", err)
        }
    })

program.command("profiles")
    .description("List the built-in profiles")
    .action(() => {
        for (const profile of Object.values(PROFILES)) {
            Logger.plain(`${profile.name.padEnd(18)} ${profile.description}`)
        }
        Logger.plain()
        for (const [alias, name] of Object.entries(PROFILE_ALIASES)) {
            Logger.plain(`${alias.padEnd(18)} alias of ${name}`)
        }
    })

// =========================================================================
// VMs
// =========================================================================

function vmCommand(name: string, description: string): Command {
    return program.command(name)
        .description(description)
        .option("-p, --profile <name>", "Profile to build")
        .option("--set <path=value>", "Override a module option, repeatable", collect, [])
        .option("--image <path>", "Boot this disk image instead of building")
        .addOption(new Option("--qemu", "Use QEMU").conflicts("ch"))
        .option("--ch", "Use Cloud Hypervisor")
}

vmCommand("run", "Boot the system interactively")
    .argument("[vmm-args...]", "Extra arguments for the VMM, after --")
    .action(async (vmmArgs: string[], options: VmCommandOptions) => {
        try {
            process.exitCode = await run({ ...options, extraArgs: vmmArgs })
        } catch (err) {
            failed("Run", err)
        }
    })

vmCommand("boot-test", "Boot the system headless and wait for a shell")
    .option("--timeout <seconds>", "Overall timeout", parseInteger)
    .action(async (options: VmCommandOptions) => {
        try {
            if (!await bootTest(options)) process.exitCode = 1
        } catch (err) {
            failed("Boot test", err)
        }
    })

vmCommand("functional-test", "Boot the functional-test profile and collect FUNC_TEST results")
    .option("--timeout <seconds>", "Overall timeout", parseInteger)
    .action(async (options: VmCommandOptions) => {
        try {
            if (!await functionalTest(options)) process.exitCode = 1
        } catch (err) {
            failed("Functional test", err)
        }
    })

vmCommand("bridge-test", "Boot with a shared directory and serve the guest's rebuild request")
    .option("--timeout <seconds>", "Overall timeout", parseInteger)
    .action(async (options: VmCommandOptions) => {
        try {
            if (!await bridgeTest(options)) process.exitCode = 1
        } catch (err) {
            failed("Bridge test", err)
        }
    })

// =========================================================================
// BRIDGE
// =========================================================================

const bridge = program.command("bridge")
    .description("Host side of the guest rebuild bridge")

bridge.command("serve")
    .description("Watch the shared directory and build requested root trees")
    .option("--shared-dir <dir>", "Shared directory (default: $REDOX_SHARED_DIR or /tmp/redox-shared)")
    .option("-p, --profile <name>", "Profile requests are applied to (default: $REDOX_PROFILE or development)")
    .action(async (options: { sharedDir?: string, profile?: string }) => {
        try {
            await serveBridge(options)
        } catch (err) {
            failed("Bridge", err)
        }
    })

bridge.command("submit")
    .description("Send a rebuild request and wait for the response")
    .argument("<config>", "JSON file with the rebuild configuration")
    .option("--shared-dir <dir>", "Shared directory")
    .option("--timeout <seconds>", "How long to wait for the host", parseInteger, 300)
    .action(async (config: string, options: { sharedDir?: string, timeout: number }) => {
        try {
            await submitBridge(config, options)
        } catch (err) {
            failed("Bridge request", err)
        }
    })

// =========================================================================
// REBUILD
// =========================================================================

program.command("rebuild")
    .description("Build, run and test profiles while keeping numbered generations")
    .argument("<action>", REBUILD_ACTIONS.join(" | "))
    .argument("[profile]", "Profile, or the generation number for rollback")
    .argument("[extra...]", "Arguments after -- go to run and test")
    .option("-p, --profile-name <name>", "Profile to use")
    .option("-v, --verbose", "Enable verbose output")
    .option("--show-trace", "Print stack traces on failure")
    .option("--json", "Machine-readable output for list-generations and version")
    .action(async (action: string, positional: string | undefined, extra: string[], options: { profileName?: string, verbose?: boolean, showTrace?: boolean, json?: boolean }) => {
        try {
            if (!isRebuildAction(action)) throw new Error(`Unknown action: ${action}`)
            if (options.verbose) Settings.verbose = true
            if (options.showTrace) Settings.showTrace = true
            process.exitCode = await rebuild(action, rebuildOptions(action, positional, extra, options))
        } catch (err) {
            failed("Rebuild", err)
        }
    })

// =========================================================================
// SYSTEM
// =========================================================================

const system = program.command("system")
    .description("Inspect and manage an installed system through its manifest")
    .option("--root <dir>", "System root", "/")
    .option("--manifest <file>", "Manifest to read instead of the one under --root")

function systemOptions(): { root: string, manifest?: string } {
    return system.opts<{ root: string, manifest?: string }>()
}

system.command("info")
    .description("Show the system described by the manifest")
    .action(async () => {
        try {
            await systemInfo(systemOptions())
        } catch (err) {
            failed("System info", err)
        }
    })

system.command("verify")
    .description("Check installed files against their recorded hashes")
    .action(async () => {
        try {
            await systemVerify({ ...systemOptions(), verbose: Settings.verbose })
        } catch (err) {
            failed("Verification", err)
        }
    })

system.command("diff")
    .description("Compare another manifest against the current one")
    .argument("<manifest>", "Older manifest")
    .action(async (other: string) => {
        try {
            await systemDiff(other, systemOptions())
        } catch (err) {
            failed("System diff", err)
        }
    })

system.command("generations")
    .description("List stored generations")
    .action(async () => {
        try {
            await systemGenerations(systemOptions())
        } catch (err) {
            failed("Listing generations", err)
        }
    })

system.command("switch")
    .description("Activate a new manifest as the next generation")
    .argument("<manifest>", "Manifest of the new system")
    .option("-d, --description <text>", "Generation description")
    .action(async (manifest: string, options: { description?: string }) => {
        try {
            await systemSwitch(manifest, { ...systemOptions(), description: options.description })
        } catch (err) {
            failed("Switch", err)
        }
    })

system.command("rollback")
    .description("Reinstall a stored generation, the previous one by default")
    .argument("[generation]", "Generation id", parseInteger)
    .action(async (generation: number | undefined) => {
        try {
            await systemRollback(generation, systemOptions())
        } catch (err) {
            failed("Rollback", err)
        }
    })

program.parseAsync(process.argv).catch((err: unknown) => failed("Command", err))
