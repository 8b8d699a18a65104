/***
 *
 *
 *  Generated Files
 *
 *  Every text file the configuration writes into the root tree, keyed by
 *  its path relative to the root.
 *
 */

import type { InitScript } from "../../types/modules"
import type { PackageSet } from "../../types/packages"
import type { EvaluatedSystem } from "../../config/evaluate"
import { sortedEntries } from "../../config/plan"
import { PASSWD, GROUP, SHADOW } from "../../files/users"
import { PROFILE, ION_INITRC, HOSTNAME, TIMEZONE, NTP_CONF, HELIX_CONFIG } from "../../files/profile"
import {
    INIT_TOML,
    STARTUP_SCRIPT,
    initScriptPath,
    programInitScripts,
    rootfsServiceScripts,
} from "../../files/services"
import {
    DHCPD_QUIET_SCRIPT,
    NETCFG_AUTO_QUIET_SCRIPT,
    NETCFG_AUTO_SCRIPT,
    NETCFG_CH_SCRIPT,
    NETCFG_STATIC_SCRIPT,
    networkInitScripts,
} from "../../files/networking"

export interface GeneratedFile {
    text: string
    mode: string
}

export type GeneratedFiles = Map<string, GeneratedFile>

/**
 * All init scripts of the system. Later sources replace earlier ones with the same name.
 */
export function collectInitScripts(system: EvaluatedSystem, packages: PackageSet): Record<string, InitScript> {
    const { config } = system
    return {
        ...config.services.initScripts,
        ...networkInitScripts(config),
        ...programInitScripts(config, packages),
        ...rootfsServiceScripts(config),
    }
}

export function generateFiles(system: EvaluatedSystem, packages: PackageSet): GeneratedFiles {
    const { config } = system
    const { networking } = config
    const files: GeneratedFiles = new Map()

    const add = (path: string, text: string, mode = "0644"): void => {
        files.set(path, { text, mode })
    }

    add("etc/profile", PROFILE(config))
    add("etc/ion/initrc", ION_INITRC(config.programs.ion.initExtra))
    add("etc/passwd", PASSWD(config.users.users))
    add("etc/group", GROUP(config.users.groups))
    add("etc/shadow", SHADOW(config.users.users), "0600")
    add("etc/init.toml", INIT_TOML)
    add("etc/hostname", HOSTNAME(config))
    add("etc/timezone", TIMEZONE(config))

    if (config.services.startupScriptEnable) {
        add("startup.sh", STARTUP_SCRIPT(config), "0755")
    }

    if (config.time.ntpEnable) {
        add("etc/ntp.conf", NTP_CONF(config))
    }

    if (config.programs.helix.enable) {
        add("etc/helix/config.toml", HELIX_CONFIG(config))
    }

    if (networking.enable) {
        add("etc/net/dns", networking.dns.join("\n"))
        add("etc/net/ip_router", networking.defaultRouter)
        add("bin/netcfg-ch", NETCFG_CH_SCRIPT(), "0755")

        if (networking.mode === "dhcp" || networking.mode === "auto") {
            add("bin/dhcpd-quiet", DHCPD_QUIET_SCRIPT, "0755")
        }

        if (networking.mode === "auto") {
            add("bin/netcfg-auto", NETCFG_AUTO_SCRIPT(), "0755")
            add("bin/netcfg-auto-quiet", NETCFG_AUTO_QUIET_SCRIPT, "0755")
        }

        if (networking.mode === "static") {
            add("bin/netcfg-static", NETCFG_STATIC_SCRIPT(config), "0755")
        }
    }

    for (const [name, iface] of sortedEntries(networking.interfaces)) {
        add(`etc/net/${name}/ip`, iface.address)
        add(`etc/net/${name}/netmask`, iface.netmask)
        add(`etc/net/${name}/gateway`, iface.gateway)
    }

    for (const [name, script] of sortedEntries(collectInitScripts(system, packages))) {
        add(initScriptPath(name, script), script.text, "0755")
    }

    return files
}
