/***
 *
 *
 *  System Profiles
 *
 *  A profile is the override layer applied between the module defaults and
 *  the user's redox.yaml. Packages a profile asks for are only included when
 *  the package index actually provides them.
 *
 */

import { readFileSync } from "fs"
import { mergeLayers, type ConfigLayer } from "./builder"
import type { PackageSet } from "../types/packages"

export type ProfileName = "minimal" | "development" | "cloud-hypervisor" | "graphical" | "functional-test"

export interface Profile {
    name: ProfileName
    description: string
    layer: (packages: PackageSet) => ConfigLayer
}

const DEVELOPMENT_PACKAGES = [
    "ion", "uutils", "helix", "binutils", "extrautils", "sodium",
    "netutils", "userutils", "bat", "hexyl", "zoxide", "dust",
]

function available(packages: PackageSet, names: string[]): string[] {
    return names.filter(name => packages.has(name))
}

const minimal: Profile = {
    name: "minimal",
    description: "Ion shell and core utilities, no networking or graphics",
    layer: packages => ({
        environment: { systemPackages: available(packages, ["ion", "uutils"]) },
        networking: { enable: false },
        graphics: { enable: false },
    }),
}

const development: Profile = {
    name: "development",
    description: "Headless system with editors, CLI tools, networking and a remote shell",
    layer: packages => ({
        environment: {
            systemPackages: available(packages, DEVELOPMENT_PACKAGES),
            shellAliases: {
                z: "zoxide query -- $@args && cd $(zoxide query -- $@args)",
            },
        },
        networking: {
            enable: true,
            mode: "auto",
            remoteShellEnable: true,
        },
        filesystem: {
            specialSymlinks: {
                "bin/sh": "/bin/ion",
                "bin/dash": "/bin/ion",
                "bin/vi": "/bin/sodium",
            },
        },
    }),
}

const cloudHypervisor: Profile = {
    name: "cloud-hypervisor",
    description: "Development profile tuned for Cloud Hypervisor with static TAP networking",
    layer: packages => mergeLayers(development.layer(packages), {
        networking: {
            mode: "static",
            interfaces: {
                "cloud-hypervisor": {
                    address: "172.16.0.2",
                    netmask: "255.255.255.0",
                    gateway: "172.16.0.1",
                },
            },
        },
        hardware: {
            storageDrivers: ["virtio-blkd"],
            networkDrivers: ["virtio-netd"],
        },
        virtualisation: {
            vmm: "cloud-hypervisor",
            tapNetworking: true,
        },
    }),
}

const graphical: Profile = {
    name: "graphical",
    description: "Development profile with the Orbital desktop and audio",
    layer: packages => mergeLayers(development.layer(packages), {
        boot: { diskSizeMB: 1024 },
        graphics: { enable: true },
        hardware: { audioEnable: true },
        virtualisation: { graphics: true },
    }),
}

// Ion test suite run in place of the interactive shell, reporting FUNC_TEST lines
function functionalTestScript(): string {
    return readFileSync(new URL("../data/functional-tests.ion", import.meta.url), "utf-8")
}

const functionalTest: Profile = {
    name: "functional-test",
    description: "Development profile that runs the functional test suite at startup",
    layer: packages => mergeLayers(development.layer(packages), {
        networking: { remoteShellEnable: false },
        services: { startupScriptText: functionalTestScript() },
        virtualisation: {
            vmm: "cloud-hypervisor",
            memorySize: 1024,
            cpus: 2,
        },
    }),
}

export const PROFILES: Record<ProfileName, Profile> = {
    "minimal": minimal,
    "development": development,
    "cloud-hypervisor": cloudHypervisor,
    "graphical": graphical,
    "functional-test": functionalTest,
}

export const PROFILE_ALIASES: Record<string, ProfileName> = {
    default: "development",
    cloud: "cloud-hypervisor",
}

function isProfileName(name: string): name is ProfileName {
    return Object.prototype.hasOwnProperty.call(PROFILES, name)
}

/**
 * Resolves a profile name or alias
 */
export function getProfile(name: string): Profile {
    if (isProfileName(name)) return PROFILES[name]

    const alias = PROFILE_ALIASES[name]
    if (alias) return PROFILES[alias]

    const known = [...Object.keys(PROFILES), ...Object.keys(PROFILE_ALIASES)].sort()
    throw new Error(`Unknown profile "${name}" (available: ${known.join(", ")})`)
}
