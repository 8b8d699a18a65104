/***
 *
 *
 *  Init Configuration
 *
 *  init.toml, startup.sh and the init scripts rendered from typed services.
 *
 */

import type { InitScript, Service, SystemConfig } from "../types/modules"
import type { PackageSet } from "../types/packages"
import { sortedEntries } from "../config/plan"

export const INIT_TOML = `[[services]]
name = "shell"
command = "/startup.sh"
stdio = "debug"
restart = false
`

export const STARTUP_SCRIPT = function(config: SystemConfig): string {
    const text = config.services.startupScriptText
    return `#!/bin/sh\n${text.endsWith("\n") ? text : `${text}\n`}`
}

/**
 * Renders one service as an init script line, or null when disabled
 */
export function serviceLine(name: string, service: Service): string | null {
    if (!service.enable) return null

    const command = [service.command, ...service.args].join(" ")
    switch (service.type) {
        case "oneshot":
            return command
        case "daemon":
            return `notify ${command}`
        case "nowait":
            return `nowait ${command}`
        case "scheme":
            return `scheme ${service.scheme ?? name} ${command}`
    }
}

function describe(service: Service, line: string): string {
    return service.description === "" ? line : `# ${service.description}\n${line}`
}

/**
 * Root filesystem services, one `50_<name>` init script each
 */
export function rootfsServiceScripts(config: SystemConfig): Record<string, InitScript> {
    const scripts: Record<string, InitScript> = {}
    for (const [name, service] of sortedEntries(config.services.services)) {
        if (service.wantedBy !== "rootfs") continue
        const line = serviceLine(name, service)
        if (line === null) continue
        scripts[`50_${name}`] = { text: describe(service, line), directory: "init.d" }
    }
    return scripts
}

/**
 * Lines for services started from the initfs
 */
export function initfsServiceLines(config: SystemConfig): string[] {
    const lines: string[] = []
    for (const [name, service] of sortedEntries(config.services.services)) {
        if (service.wantedBy !== "initfs") continue
        const line = serviceLine(name, service)
        if (line !== null) lines.push(describe(service, line))
    }
    return lines
}

/**
 * Init scripts for enabled programs: the Orbital desktop and the web server
 */
export function programInitScripts(config: SystemConfig, packages: PackageSet): Record<string, InitScript> {
    const scripts: Record<string, InitScript> = {}

    if (config.graphics.enable) {
        scripts["20_orbital"] = {
            text: packages.has("orbutils")
                ? "export VT 1\nnowait /bin/orbital /bin/orblogin /bin/orbterm"
                : "export VT 1\nnowait /bin/orbital /bin/login",
            directory: "usr/lib/init.d",
        }
    }

    const { httpd } = config.programs
    if (httpd.enable) {
        scripts["30_httpd"] = {
            text: `echo "Starting httpd on port ${httpd.port}..."\nnowait /bin/httpd --port ${httpd.port} --root ${httpd.rootDir}`,
            directory: "init.d",
        }
    }

    return scripts
}

/**
 * Path of an init script inside the root tree
 */
export function initScriptPath(name: string, script: InitScript): string {
    const dir = script.directory === "init.d" ? "etc/init.d" : script.directory.replace(/^\/+|\/+$/g, "")
    return `${dir}/${name}`
}
