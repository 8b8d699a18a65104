/***
 *
 *
 *  Package Index (packages.json)
 *
 *  Prebuilt RedoxOS packages live in directories next to the index.
 *  The build only ever reads from them.
 *
 */

import { z } from "zod"
import { readFile } from "fs/promises"
import { join, dirname, resolve } from "path"
import { fileExists } from "../utils/path"

const PackageEntrySchema = z.object({
    name: z.string().min(1),
    version: z.string().default(""),
    path: z.string().min(1),
})

export const PackageIndexSchema = z.object({
    packages: z.array(PackageEntrySchema),
})

export type PackageIndex = z.infer<typeof PackageIndexSchema>

export interface ResolvedPackage {
    name: string
    version: string
    // Absolute directory of the package contents
    path: string
}

// Names guests and configs use for packages published under another name
const PACKAGE_ALIASES: Record<string, string> = {
    "ion": "ion-shell",
    "base": "redox-base",
    "snix": "snix-redox",
}

export class PackageSet {

    private readonly packages = new Map<string, ResolvedPackage>()

    constructor(packages: ResolvedPackage[]) {
        for (const pkg of packages) {
            this.packages.set(pkg.name, pkg)
        }
    }

    /**
     * Resolves a package name, trying the direct name first and then its alias
     */
    public resolve(name: string): ResolvedPackage | undefined {
        const direct = this.packages.get(name)
        if (direct) return direct
        const alias = PACKAGE_ALIASES[name]
        return alias ? this.packages.get(alias) : undefined
    }

    public has(name: string): boolean {
        return this.resolve(name) !== undefined
    }

    public get(name: string): ResolvedPackage {
        const pkg = this.resolve(name)
        if (!pkg) {
            throw new Error(`unknown package: ${name} (available: ${this.names().join(", ")})`)
        }
        return pkg
    }

    public names(): string[] {
        return [...this.packages.keys()].sort()
    }

    public all(): ResolvedPackage[] {
        return this.names().map(name => this.get(name))
    }
}

/**
 * Loads packages.json from a package directory
 */
export async function loadPackageSet(packagesDir: string): Promise<PackageSet> {
    const indexPath = join(packagesDir, "packages.json")
    if (!fileExists(indexPath)) {
        throw new Error(`Package index not found: ${indexPath}`)
    }

    const parsed: unknown = JSON.parse(await readFile(indexPath, "utf-8"))
    const index = PackageIndexSchema.parse(parsed)
    const base = dirname(resolve(indexPath))

    return new PackageSet(index.packages.map(entry => ({
        name: entry.name,
        version: entry.version,
        path: resolve(base, entry.path),
    })))
}
