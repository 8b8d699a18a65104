/***
 *
 *
 *  Configuration Assertions and Warnings
 *
 *  Assertions are checked after all layers are merged. Every failed
 *  assertion is collected so they can be reported together before any
 *  build step runs. Warnings never fail a build.
 *
 */

import type { SystemConfig } from "../types/modules"
import type { PackageSet } from "../types/packages"
import { sortedEntries } from "./plan"

export interface Assertion {
    assertion: boolean
    message: string
}

// Smallest RedoxFS partition the image builder accepts
export const MIN_REDOXFS_MB = 16

function duplicates(entries: [string, number][], label: string, id: string): Assertion[] {
    const byId = new Map<number, string[]>()
    for (const [name, value] of entries) {
        byId.set(value, [...(byId.get(value) ?? []), name])
    }

    return [...byId.entries()]
        .filter(([, names]) => names.length > 1)
        .map(([value, names]) => ({
            assertion: false,
            message: `${label}: ${id} ${value} is used by ${names.join(", ")}`,
        }))
}

export function collectAssertions(config: SystemConfig, packages: PackageSet): Assertion[] {
    const { boot, graphics, environment, users, security, programs, networking } = config
    const userEntries = sortedEntries(users.users)
    const groupEntries = sortedEntries(users.groups)

    const assertions: Assertion[] = [
        {
            assertion: boot.diskSizeMB > boot.espSizeMB,
            message: `boot.diskSizeMB (${boot.diskSizeMB}) must be greater than boot.espSizeMB (${boot.espSizeMB})`,
        },
        {
            assertion: boot.diskSizeMB - boot.espSizeMB >= MIN_REDOXFS_MB,
            message: `boot.diskSizeMB - boot.espSizeMB must leave at least ${MIN_REDOXFS_MB} MB for RedoxFS (got ${boot.diskSizeMB - boot.espSizeMB} MB)`,
        },
        {
            assertion: !graphics.enable || packages.has("orbital"),
            message: "graphics.enable requires the orbital package, which is not in the package index",
        },
        ...environment.systemPackages.map(name => ({
            assertion: packages.has(name),
            message: `environment.systemPackages: unknown package "${name}"`,
        })),
        ...duplicates(userEntries.map(([name, user]): [string, number] => [name, user.uid]), "users.users", "uid"),
        ...duplicates(groupEntries.map(([name, group]): [string, number] => [name, group.gid]), "users.groups", "gid"),
        ...userEntries.map(([name, user]) => ({
            assertion: !security.requirePasswords || user.password !== "",
            message: `security.requirePasswords is set but user "${name}" has no password`,
        })),
        {
            assertion: !programs.helix.enable || packages.has("helix"),
            message: "programs.helix.enable requires the helix package, which is not in the package index",
        },
        {
            assertion: !(programs.httpd.enable && networking.enable && networking.remoteShellEnable
                && programs.httpd.port === networking.remoteShellPort),
            message: `programs.httpd.port (${programs.httpd.port}) conflicts with networking.remoteShellPort`,
        },
    ]

    return assertions
}

export function failedAssertions(config: SystemConfig, packages: PackageSet): string[] {
    return collectAssertions(config, packages)
        .filter(item => !item.assertion)
        .map(item => item.message)
}

export function collectWarnings(config: SystemConfig): string[] {
    const { networking, security, users } = config
    const warnings: string[] = []

    if (networking.enable && networking.mode === "static" && Object.keys(networking.interfaces).length === 0) {
        warnings.push("networking.mode is \"static\" but no interfaces are configured, the network stays down")
    }

    if (networking.enable && networking.remoteShellEnable && !security.allowRemoteRoot) {
        warnings.push(`networking.remoteShellEnable serves a root shell on port ${networking.remoteShellPort} while security.allowRemoteRoot is false`)
    }

    for (const [groupName, group] of sortedEntries(users.groups)) {
        for (const member of group.members) {
            if (!(member in users.users)) {
                warnings.push(`group "${groupName}" lists unknown user "${member}"`)
            }
        }
    }

    const gids = new Set(Object.values(users.groups).map(group => group.gid))
    for (const [name, user] of sortedEntries(users.users)) {
        if (!gids.has(user.gid)) {
            warnings.push(`user "${name}" has gid ${user.gid} but no group uses it`)
        }
    }

    return warnings
}
