/***
 *
 *
 *  Manifest Diff
 *
 *  Compares an older manifest against a newer one. Changes are written as
 *  "old -> new".
 *
 */

import type { Manifest } from "../../types/manifest"

// Per-kind limit of listed files, the rest is summarised
const FILE_LIST_LIMIT = 20

function shortHash(hash: string): string {
    return hash.slice(0, 12)
}

function section(lines: string[], title: string, entries: string[]): void {
    if (entries.length === 0) return
    if (lines.length > 0) lines.push("")
    lines.push(title, ...entries)
}

function packageChanges(older: Manifest, newer: Manifest): string[] {
    const before = new Map(older.packages.map(pkg => [pkg.name, pkg.version]))
    const after = new Map(newer.packages.map(pkg => [pkg.name, pkg.version]))
    const changes: string[] = []

    for (const name of [...after.keys()].sort()) {
        const version = after.get(name) ?? ""
        const previous = before.get(name)
        if (previous === undefined) {
            changes.push(`  + ${name} ${version}`)
        } else if (previous !== version) {
            changes.push(`  ~ ${name} ${previous} -> ${version}`)
        }
    }
    for (const name of [...before.keys()].sort()) {
        if (!after.has(name)) changes.push(`  - ${name} ${before.get(name) ?? ""}`)
    }

    return changes
}

function setChanges(before: string[], after: string[]): string[] {
    const old = new Set(before)
    const current = new Set(after)
    return [
        ...[...current].filter(item => !old.has(item)).sort().map(item => `  + ${item}`),
        ...[...old].filter(item => !current.has(item)).sort().map(item => `  - ${item}`),
    ]
}

function configurationChanges(older: Manifest, newer: Manifest): string[] {
    const a = older.configuration
    const b = newer.configuration
    const fields: [string, string | number | boolean, string | number | boolean][] = [
        ["networking.enabled", a.networking.enabled, b.networking.enabled],
        ["networking.mode", a.networking.mode, b.networking.mode],
        ["graphics.enabled", a.graphics.enabled, b.graphics.enabled],
        ["boot.diskSizeMB", a.boot.diskSizeMB, b.boot.diskSizeMB],
        ["security.protectKernelSchemes", a.security.protectKernelSchemes, b.security.protectKernelSchemes],
    ]
    return fields
        .filter(([, before, after]) => before !== after)
        .map(([name, before, after]) => `  ${name}: ${before} -> ${after}`)
}

function fileChanges(older: Manifest, newer: Manifest): string[] {
    const before = older.files
    const after = newer.files

    const added = Object.keys(after).filter(path => !(path in before)).sort()
    const removed = Object.keys(before).filter(path => !(path in after)).sort()
    const changed = Object.keys(after)
        .filter(path => path in before && before[path].hash !== after[path].hash)
        .sort()

    const total = added.length + removed.length + changed.length
    if (total === 0) return []

    const lines = [
        `Files (${added.length} added, ${removed.length} removed, ${changed.length} changed):`,
        ...added.slice(0, FILE_LIST_LIMIT).map(path => `  + ${path}`),
        ...removed.slice(0, FILE_LIST_LIMIT).map(path => `  - ${path}`),
        ...changed.slice(0, FILE_LIST_LIMIT).map(path => `  ~ ${path}`),
    ]
    if (total > FILE_LIST_LIMIT * 3) {
        lines.push(`  ... and ${total - FILE_LIST_LIMIT * 3} more`)
    }
    return lines
}

export function diffManifests(older: Manifest, newer: Manifest): string[] {
    const lines: string[] = []

    if (older.generation.id !== newer.generation.id) {
        lines.push(`Generation: ${older.generation.id} -> ${newer.generation.id}`)
    }
    if (older.generation.buildHash !== newer.generation.buildHash
        && older.generation.buildHash !== "" && newer.generation.buildHash !== "") {
        lines.push(`Build hash: ${shortHash(older.generation.buildHash)}… -> ${shortHash(newer.generation.buildHash)}…`)
    }
    if (older.system.redoxSystemVersion !== newer.system.redoxSystemVersion) {
        lines.push(`Version: ${older.system.redoxSystemVersion} -> ${newer.system.redoxSystemVersion}`)
    }
    if (older.system.profile !== newer.system.profile) {
        lines.push(`Profile: ${older.system.profile} -> ${newer.system.profile}`)
    }
    if (older.system.hostname !== newer.system.hostname) {
        lines.push(`Hostname: ${older.system.hostname} -> ${newer.system.hostname}`)
    }

    section(lines, "Packages:", packageChanges(older, newer))
    section(lines, "Drivers:", setChanges(older.drivers.all, newer.drivers.all))
    section(lines, "Users:", setChanges(Object.keys(older.users), Object.keys(newer.users)))
    section(lines, "Configuration:", configurationChanges(older, newer))

    const files = fileChanges(older, newer)
    if (files.length > 0) {
        const [title, ...entries] = files
        section(lines, title, entries)
    }

    return lines.length > 0 ? lines : ["No differences."]
}
