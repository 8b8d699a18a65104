/***
 *
 *
 *  Build Plan
 *
 *  Values derived from a validated configuration that every build step
 *  shares: which drivers and daemons go into the initfs, which packages
 *  land in the root tree, which directories exist and who the console
 *  user is.
 *
 */

import { z } from "zod"
import registryJson from "../data/pci-registry.json"
import type { SystemConfig, User } from "../types/modules"
import type { PackageSet, ResolvedPackage } from "../types/packages"

const PciMatchSchema = z.object({
    name: z.string().optional(),
    class: z.string().optional(),
    subclass: z.string().optional(),
    vendor: z.string().optional(),
    device: z.string().optional(),
})

export const PciRegistrySchema = z.record(z.array(PciMatchSchema))

export type PciMatch = z.infer<typeof PciMatchSchema>

export interface PciDriverEntry extends PciMatch {
    command: string
}

export const PCI_REGISTRY = PciRegistrySchema.parse(registryJson)

const CORE_DAEMONS = [
    "init", "logd", "ramfs", "randd", "zerod", "pcid", "pcid-spawner",
    "lived", "acpid", "hwd", "rtcd", "ptyd", "ipcd",
]

const GRAPHICS_PACKAGES = ["orbital", "orbdata", "orbterm", "orbutils"]

export interface ConsoleUser {
    name: string
    home: string
}

export interface BuildPlan {
    profile: string
    graphicsEnabled: boolean
    networkingEnabled: boolean
    usbEnabled: boolean
    audioEnabled: boolean
    initfsEnableGraphics: boolean
    allDrivers: string[]
    pcidDrivers: PciDriverEntry[]
    coreDaemons: string[]
    initfsDaemons: string[]
    allDaemons: string[]
    packages: ResolvedPackage[]
    userutilsInstalled: boolean
    homeDirectories: string[]
    allDirectories: string[]
    defaultUser: ConsoleUser
}

export function unique<T>(items: T[]): T[] {
    return [...new Set(items)]
}

export function userHome(name: string, user: User): string {
    return user.home ?? `/home/${name}`
}

/**
 * Entries of a record, ordered by key
 */
export function sortedEntries<T>(record: Record<string, T>): [string, T][] {
    return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

function collectPackages(config: SystemConfig, packages: PackageSet, networkingEnabled: boolean, graphicsEnabled: boolean): ResolvedPackage[] {
    const wanted = [
        ...config.environment.systemPackages,
        "base",
        ...(networkingEnabled ? ["netutils"] : []),
        ...(graphicsEnabled ? GRAPHICS_PACKAGES : []),
        ...(config.programs.helix.enable ? ["helix"] : []),
    ]

    const seen = new Set<string>()
    const result: ResolvedPackage[] = []
    for (const name of wanted) {
        const pkg = packages.resolve(name)
        if (!pkg || seen.has(pkg.name)) continue
        seen.add(pkg.name)
        result.push(pkg)
    }
    return result
}

export function createBuildPlan(config: SystemConfig, packages: PackageSet, profile: string): BuildPlan {
    const graphicsEnabled = config.graphics.enable
    const networkingEnabled = config.networking.enable
    const usbEnabled = config.hardware.usbEnable || graphicsEnabled
    const audioEnabled = config.hardware.audioEnable
    const initfsEnableGraphics = config.boot.initfsEnableGraphics || graphicsEnabled

    const allDrivers = unique([
        ...config.hardware.storageDrivers,
        ...config.hardware.networkDrivers,
        ...(graphicsEnabled ? config.hardware.graphicsDrivers : []),
        ...(audioEnabled ? config.hardware.audioDrivers : []),
        ...(usbEnabled ? ["xhcid"] : []),
        ...config.boot.initfsExtraDrivers,
    ])

    const pcidDrivers = allDrivers.flatMap(command =>
        (PCI_REGISTRY[command] ?? []).map(match => ({ ...match, command })))

    const coreDaemons = [
        ...CORE_DAEMONS,
        ...(initfsEnableGraphics ? ["ps2d"] : []),
        ...(networkingEnabled ? ["smolnetd"] : []),
    ]

    const initfsDaemons = [
        ...(initfsEnableGraphics ? ["vesad", "inputd", "fbbootlogd", "fbcond"] : []),
        ...(usbEnabled ? ["xhcid", "usbhubd", "usbhidd"] : []),
    ]

    const allPackages = collectPackages(config, packages, networkingEnabled, graphicsEnabled)
    const userutils = packages.resolve("userutils")

    const users = sortedEntries(config.users.users)
    const homeDirectories = users
        .filter(([, user]) => user.createHome)
        .map(([name, user]) => userHome(name, user))

    const allDirectories = unique([
        ...config.filesystem.extraDirectories,
        ...homeDirectories,
        ...(networkingEnabled ? ["/var/log"] : []),
        ...(config.logging.logToFile ? [config.logging.logPath] : []),
        ...(config.programs.httpd.enable ? [config.programs.httpd.rootDir] : []),
    ])

    const firstNonRoot = users.find(([, user]) => user.uid > 0)
    const defaultUser = firstNonRoot
        ? { name: firstNonRoot[0], home: userHome(firstNonRoot[0], firstNonRoot[1]) }
        : { name: "root", home: "/root" }

    return {
        profile,
        graphicsEnabled,
        networkingEnabled,
        usbEnabled,
        audioEnabled,
        initfsEnableGraphics,
        allDrivers,
        pcidDrivers,
        coreDaemons,
        initfsDaemons,
        allDaemons: unique([...coreDaemons, ...initfsDaemons, ...config.boot.initfsExtraBinaries]),
        packages: allPackages,
        userutilsInstalled: userutils !== undefined && allPackages.some(pkg => pkg.name === userutils.name),
        homeDirectories,
        allDirectories,
        defaultUser,
    }
}
