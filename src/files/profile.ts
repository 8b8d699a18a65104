/***
 *
 *
 *  Shell Environment Files
 *
 */

import type { SystemConfig } from "../types/modules"
import { sortedEntries } from "../config/plan"

export const ION_PROMPT = "let PROMPT = \"ion> \""

/**
 * /etc/profile, sourced by every login shell
 */
export const PROFILE = function(config: SystemConfig): string {
    const { environment, graphics } = config

    const sections = [
        sortedEntries(environment.variables).map(([name, value]) => `export ${name} ${value}`),
        graphics.enable
            ? [`export ORBITAL_RESOLUTION ${graphics.resolution}`, "export DISPLAY :0"]
            : [],
        sortedEntries(environment.shellAliases).map(([name, value]) => `alias ${name} = "${value}"`),
        graphics.enable
            ? ["alias gui = \"orbital\"", "alias term = \"orbterm\""]
            : [],
        environment.shellInit.trim() === "" ? [] : [environment.shellInit.trimEnd()],
    ]

    return [
        "# RedoxOS System Profile (generated by redox-forge)",
        ...sections.flat(),
    ].join("\n") + "\n"
}

export const ION_INITRC = function(initExtra = ""): string {
    const extra = initExtra.trim() === "" ? "" : `${initExtra.trimEnd()}\n`
    return `${ION_PROMPT}\n${extra}`
}

export const HOSTNAME = function(config: SystemConfig): string {
    return `${config.time.hostname}\n`
}

export const TIMEZONE = function(config: SystemConfig): string {
    return `${config.time.timezone}\n`
}

export const NTP_CONF = function(config: SystemConfig): string {
    return config.time.ntpServers.map(server => `server ${server} iburst`).join("\n") + "\n"
}

export const HELIX_CONFIG = function(config: SystemConfig): string {
    return `theme = "${config.programs.helix.theme}"

[editor]
line-number = "relative"
mouse = false
`
}
