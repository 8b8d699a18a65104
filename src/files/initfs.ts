/***
 *
 *
 *  Initfs Configuration
 *
 *  The initfs init daemon runs the numbered scripts in etc/init.d in order,
 *  then hands over to the root filesystem in 90_exit_initfs. pcid-spawner
 *  reads etc/pcid.d/initfs.toml to match PCI devices to drivers.
 *
 */

import type { SystemConfig } from "../types/modules"
import type { BuildPlan, PciDriverEntry } from "../config/plan"
import { initfsServiceLines } from "./services"

const DRIVER_DIR = "/scheme/initfs/lib/drivers"

function tomlValue(value: string): string {
    if (value.startsWith("0x") || /^[0-9]+$/.test(value)) return value
    return `"${value}"`
}

export function pcidEntry(entry: PciDriverEntry): string {
    const lines = ["[[drivers]]"]
    const keys = ["name", "class", "subclass", "vendor", "device"] as const
    for (const key of keys) {
        const value = entry[key]
        if (value !== undefined) lines.push(`${key} = ${tomlValue(value)}`)
    }
    lines.push(`command = ["${DRIVER_DIR}/${entry.command}"]`)
    return lines.join("\n") + "\n"
}

export const PCID_TOML = function(plan: BuildPlan): string {
    return "# PCI drivers - generated by redox-forge\n" + plan.pcidDrivers.map(pcidEntry).join("\n")
}

function script(comment: string, lines: string[]): string {
    return [`# ${comment}`, ...lines].join("\n") + "\n"
}

/**
 * Numbered initfs init scripts, in boot order. Scripts with nothing to do are left out.
 */
export function initfsScripts(config: SystemConfig, plan: BuildPlan): [string, string][] {
    const scripts: [string, string][] = []
    const env = config.environment.variables

    scripts.push(["00_runtime", script("Core runtime daemons", [
        "export PATH /scheme/initfs/bin",
        "export LD_LIBRARY_PATH /scheme/initfs/lib",
        "export RUST_BACKTRACE 1",
        "rtcd",
        "scheme null nulld",
        "scheme zero zerod",
        "scheme rand randd",
    ])])

    scripts.push(["10_logging", script("Logging infrastructure", [
        "scheme log logd",
        "stdio /scheme/log",
        "scheme logging ramfs logging",
    ])])

    if (plan.initfsEnableGraphics) {
        scripts.push(["20_graphics", script("Graphics and input", [
            "scheme input inputd",
            "notify vesad",
            "unset FRAMEBUFFER_ADDR FRAMEBUFFER_VIRT FRAMEBUFFER_WIDTH FRAMEBUFFER_HEIGHT FRAMEBUFFER_STRIDE",
            "scheme fbbootlog fbbootlogd",
            "inputd -A 1",
            "scheme fbcon fbcond 2",
        ])])
    }

    scripts.push(["30_live", script("Live daemon", ["notify lived"])])

    scripts.push(["40_drivers", script("Hardware and PCI drivers", [
        ...(plan.initfsEnableGraphics ? ["notify ps2d"] : []),
        "notify hwd",
        "unset RSDP_ADDR RSDP_SIZE",
        "pcid-spawner --initfs",
    ])])

    const serviceLines = initfsServiceLines(config)
    if (serviceLines.length > 0) {
        scripts.push(["45_services", script("Configured initfs services", serviceLines)])
    }

    scripts.push(["50_rootfs", script("Mount root filesystem", [
        "redoxfs --uuid $REDOXFS_UUID file $REDOXFS_BLOCK",
        "unset REDOXFS_UUID REDOXFS_BLOCK REDOXFS_PASSWORD_ADDR REDOXFS_PASSWORD_SIZE",
    ])])

    scripts.push(["90_exit_initfs", script("Exit initfs and enter userspace", [
        "cd /",
        "export PATH /usr/bin",
        "export LD_LIBRARY_PATH /usr/lib",
        "unset LD_LIBRARY_PATH",
        "run.d /usr/lib/init.d /etc/init.d",
        "echo \"\"",
        "echo \"==========================================\"",
        "echo \"  Redox OS Boot Complete!\"",
        "echo \"==========================================\"",
        "echo \"\"",
        `export TERM ${env.TERM ?? "xterm-256color"}`,
        "export XDG_CONFIG_HOME /etc",
        `export HOME ${plan.defaultUser.home}`,
        `export USER ${plan.defaultUser.name}`,
        `export PATH ${env.PATH ?? "/bin:/usr/bin"}`,
        plan.userutilsInstalled ? "/bin/getty debug:" : "/startup.sh",
    ])])

    return scripts
}
