/***
 *
 *
 *  System Manifest (etc/redox-system/manifest.json)
 *
 */

import { z } from "zod"

export const MANIFEST_PATH = "etc/redox-system/manifest.json"
export const GENERATIONS_DIR = "etc/redox-system/generations"

const SystemInfoSchema = z.object({
    redoxSystemVersion: z.string(),
    target: z.string(),
    profile: z.string(),
    hostname: z.string(),
    timezone: z.string(),
})

const GenerationInfoSchema = z.object({
    id: z.number().int().nonnegative().default(1),
    buildHash: z.string().default(""),
    description: z.string().default("initial build"),
    // Set when a generation is switched to, empty for a fresh build
    timestamp: z.string().default(""),
})

const ManifestConfigurationSchema = z.object({
    boot: z.object({
        diskSizeMB: z.number(),
        espSizeMB: z.number(),
    }),
    hardware: z.object({
        storageDrivers: z.array(z.string()),
        networkDrivers: z.array(z.string()),
        graphicsDrivers: z.array(z.string()),
        audioDrivers: z.array(z.string()),
        usbEnabled: z.boolean(),
    }),
    networking: z.object({
        enabled: z.boolean(),
        mode: z.string(),
        dns: z.array(z.string()),
    }),
    graphics: z.object({
        enabled: z.boolean(),
        resolution: z.string(),
    }),
    security: z.object({
        protectKernelSchemes: z.boolean(),
        requirePasswords: z.boolean(),
        allowRemoteRoot: z.boolean(),
    }),
    logging: z.object({
        logLevel: z.string(),
        kernelLogLevel: z.string(),
        logToFile: z.boolean(),
        maxLogSizeMB: z.number(),
    }),
    power: z.object({
        acpiEnabled: z.boolean(),
        powerAction: z.string(),
        rebootOnPanic: z.boolean(),
    }),
})

const ManifestPackageSchema = z.object({
    name: z.string(),
    version: z.string(),
    storePath: z.string().default(""),
})

export const FileInfoSchema = z.object({
    hash: z.string(),
    size: z.number().int().nonnegative(),
    mode: z.string(),
})

export const ManifestSchema = z.object({
    manifestVersion: z.number().int().positive(),
    system: SystemInfoSchema,
    generation: GenerationInfoSchema.default({}),
    configuration: ManifestConfigurationSchema,
    packages: z.array(ManifestPackageSchema),
    drivers: z.object({
        all: z.array(z.string()),
        initfs: z.array(z.string()),
        core: z.array(z.string()),
    }),
    users: z.record(z.object({
        uid: z.number(),
        gid: z.number(),
        home: z.string(),
        shell: z.string(),
    })),
    groups: z.record(z.object({
        gid: z.number(),
        members: z.array(z.string()),
    })),
    services: z.object({
        initScripts: z.array(z.string()),
        startupScript: z.string(),
    }),
    files: z.record(FileInfoSchema).default({}),
    systemProfile: z.string().default(""),
})

export type Manifest = z.infer<typeof ManifestSchema>
export type FileInfo = z.infer<typeof FileInfoSchema>
export type GenerationInfo = z.infer<typeof GenerationInfoSchema>
export type ManifestPackage = z.infer<typeof ManifestPackageSchema>

/**
 * Parses manifest JSON text, throwing a readable error for malformed files
 */
export function parseManifest(text: string, source: string): Manifest {
    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (err) {
        throw new Error(`Failed to parse manifest ${source}: ${err instanceof Error ? err.message : String(err)}`)
    }

    const result = ManifestSchema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
        throw new Error(`Invalid manifest ${source}: ${issues.join("; ")}`)
    }
    return result.data
}

export function serializeManifest(manifest: Manifest): string {
    return JSON.stringify(manifest, null, 2) + "\n"
}
