/***
 *
 *
 *  System Command
 *
 *  Inspects and manages an installed system through its manifest. Every
 *  action works on a root directory, "/" inside a running guest or a
 *  staged root tree on the host.
 *
 */

import { resolve } from "path"
import { Logger } from "../../utils/log"
import type { Manifest } from "../../types/manifest"
import { loadManifest, loadManifestFile } from "./manifest"
import { verifyTree } from "./verify"
import { diffManifests } from "./diff"
import { listGenerations, rollbackGeneration, switchGeneration, systemPaths } from "./generations"

export interface SystemOptions {
    root: string
    manifest?: string
}

export function infoLines(manifest: Manifest): string[] {
    const { system, generation, configuration: cfg } = manifest

    const lines = [
        "RedoxOS System Information",
        "==========================",
        "",
        "System:",
        `  Version:    ${system.redoxSystemVersion}`,
        `  Target:     ${system.target}`,
        `  Profile:    ${system.profile}`,
        `  Hostname:   ${system.hostname}`,
        `  Timezone:   ${system.timezone}`,
        `  Generation: ${generation.id} ${generation.description}`.trimEnd(),
    ]
    if (generation.timestamp !== "") {
        lines.push(`  Built:      ${generation.timestamp}`)
    }

    lines.push(
        "",
        "Configuration:",
        `  Disk:       ${cfg.boot.diskSizeMB} MB (ESP ${cfg.boot.espSizeMB} MB)`,
        `  Networking: ${cfg.networking.enabled ? "enabled" : "disabled"} (${cfg.networking.mode})`,
    )
    if (cfg.networking.dns.length > 0) {
        lines.push(`  DNS:        ${cfg.networking.dns.join(", ")}`)
    }
    lines.push(
        `  Graphics:   ${cfg.graphics.enabled ? `enabled (${cfg.graphics.resolution})` : "disabled"}`,
        `  Security:   kernel-protect=${cfg.security.protectKernelSchemes} require-pw=${cfg.security.requirePasswords} remote-root=${cfg.security.allowRemoteRoot}`,
        `  Logging:    level=${cfg.logging.logLevel} kernel=${cfg.logging.kernelLogLevel} file=${cfg.logging.logToFile}`,
        `  Power:      acpi=${cfg.power.acpiEnabled} action=${cfg.power.powerAction} reboot-on-panic=${cfg.power.rebootOnPanic}`,
        "",
        `Packages:     ${manifest.packages.length} installed`,
        ...manifest.packages.map(pkg => (pkg.version === "" ? `  - ${pkg.name}` : `  - ${pkg.name} ${pkg.version}`)),
        "",
        `Drivers:      ${manifest.drivers.all.length} total`,
        ...manifest.drivers.all.map(driver => `  - ${driver}`),
        "",
        `Users:        ${Object.keys(manifest.users).length}`,
        ...Object.entries(manifest.users).map(([name, user]) => `  - ${name} (uid=${user.uid} gid=${user.gid} home=${user.home})`),
        "",
        `Services:     ${manifest.services.initScripts.length} init scripts`,
        ...manifest.services.initScripts.map(script => `  - ${script}`),
        "",
        `Files:        ${Object.keys(manifest.files).length} tracked`,
    )

    return lines
}

function print(lines: string[]): void {
    for (const line of lines) Logger.plain(line)
}

async function currentManifest(options: SystemOptions): Promise<Manifest> {
    return options.manifest
        ? loadManifestFile(resolve(options.manifest))
        : loadManifest(resolve(options.root))
}

export async function systemInfo(options: SystemOptions): Promise<void> {
    print(infoLines(await currentManifest(options)))
}

export async function systemVerify(options: SystemOptions & { verbose?: boolean }): Promise<void> {
    const manifest = await currentManifest(options)
    const result = await verifyTree(manifest, resolve(options.root), { verbose: options.verbose })
    print(result.lines)
    if (!result.ok) {
        throw new Error(`${result.modified + result.missing} file(s) failed verification`)
    }
}

export async function systemDiff(other: string, options: SystemOptions): Promise<void> {
    const older = await loadManifestFile(resolve(other))
    print(diffManifests(older, await currentManifest(options)))
}

export async function systemGenerations(options: SystemOptions): Promise<void> {
    print(await listGenerations(systemPaths(resolve(options.root))))
}

export async function systemSwitch(manifestPath: string, options: SystemOptions & { description?: string }): Promise<void> {
    const result = await switchGeneration(systemPaths(resolve(options.root)), resolve(manifestPath), {
        description: options.description,
    })
    print(result.lines)
}

export async function systemRollback(target: number | undefined, options: SystemOptions): Promise<void> {
    const result = await rollbackGeneration(systemPaths(resolve(options.root)), target)
    print(result.lines)
}
