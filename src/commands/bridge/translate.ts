/***
 *
 *
 *  Rebuild Config Translation
 *
 *  Turns the RebuildConfig a guest sends into an override layer for the
 *  config builder. Guests use a few option names of their own, which are
 *  renamed to the module options they stand for.
 *
 */

import type { ConfigLayer } from "../../config/builder"
import type { RebuildConfig } from "../../types/bridge"

type Section = Record<string, unknown>

const SECTION_RENAMES: Record<string, Record<string, string>> = {
    logging: { kernelLevel: "kernelLogLevel" },
    power: { acpiEnabled: "acpiEnable" },
}

const VERBATIM_SECTIONS = ["networking", "graphics", "security", "logging", "power", "programs"] as const

function renameKeys(section: Section, renames: Record<string, string> = {}): Section {
    return Object.fromEntries(Object.entries(section).map(([key, value]) => [renames[key] ?? key, value]))
}

export function rebuildConfigLayer(config: RebuildConfig): ConfigLayer {
    const layer: ConfigLayer = {}

    if (config.packages) {
        layer.environment = { systemPackages: config.packages }
    }

    const time: Section = {}
    if (config.hostname !== undefined) time.hostname = config.hostname
    if (config.timezone !== undefined) time.timezone = config.timezone
    if (Object.keys(time).length > 0) layer.time = time

    if (config.users) {
        layer.users = { users: config.users }
    }

    for (const name of VERBATIM_SECTIONS) {
        const section = config[name]
        if (section) layer[name] = renameKeys(section, SECTION_RENAMES[name])
    }

    return layer
}

/**
 * One-line description of a request, e.g. "hostname=box, packages=[ripgrep]"
 */
export function summarizeRebuildConfig(config: RebuildConfig): string {
    const parts: string[] = []
    if (config.hostname) parts.push(`hostname=${config.hostname}`)
    if (config.packages) parts.push(`packages=[${config.packages.join(", ")}]`)
    const mode = config.networking?.mode
    if (typeof mode === "string") parts.push(`networking.mode=${mode}`)
    return parts.length > 0 ? parts.join(", ") : "no changes"
}
