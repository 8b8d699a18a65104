/***
 *
 *
 *  Configuration Builder
 *
 *  Combines named override layers in a fixed precedence order:
 *
 *      defaults → profile → user → cli
 *
 *  Plain objects merge key by key, arrays and scalars from a later layer
 *  replace earlier ones, and `null` removes a key.
 *
 */

import { z } from "zod"
import { parse as parseYaml } from "yaml"
import { SystemConfigSchema, type SystemConfig } from "../types/modules"

export type ConfigLayerName = "defaults" | "profile" | "user" | "cli"

export const LAYER_ORDER: readonly ConfigLayerName[] = ["defaults", "profile", "user", "cli"]

export type ConfigLayer = Record<string, unknown>

export class ConfigValidationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid system configuration:\n${issues.map(issue => `  ${issue}`).join("\n")}`)
        this.name = "ConfigValidationError"
    }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Merges `overlay` on top of `base` without touching either input
 */
export function mergeLayers(base: ConfigLayer, overlay: ConfigLayer): ConfigLayer {
    const result: ConfigLayer = { ...base }

    for (const [key, value] of Object.entries(overlay)) {
        if (value === undefined) continue

        if (value === null) {
            delete result[key]
            continue
        }

        const current = result[key]
        if (isPlainObject(current) && isPlainObject(value)) {
            result[key] = mergeLayers(current, value)
        } else {
            result[key] = structuredClone(value)
        }
    }

    return result
}

/**
 * Turns `networking.mode=dhcp` into `{ networking: { mode: "dhcp" } }`.
 * The value is read as YAML, so numbers, booleans, lists and null work.
 */
export function parseSetFlag(assignment: string): ConfigLayer {
    const eq = assignment.indexOf("=")
    if (eq <= 0) {
        throw new Error(`Invalid --set value "${assignment}", expected path=value`)
    }

    const path = assignment.slice(0, eq).trim().split(".").filter(Boolean)
    if (path.length === 0) {
        throw new Error(`Invalid --set path in "${assignment}"`)
    }

    const raw = assignment.slice(eq + 1)
    let value: unknown = raw.trim() === "" ? "" : parseYaml(raw)

    for (let i = path.length - 1; i >= 0; i--) {
        value = { [path[i]]: value }
    }

    return isPlainObject(value) ? value : {}
}

export class ConfigBuilder {

    private readonly layers: ReadonlyMap<ConfigLayerName, ConfigLayer>
    // The cli layer, one entry per override, applied in order
    private readonly overrides: readonly ConfigLayer[]

    constructor(layers: Partial<Record<ConfigLayerName, ConfigLayer>> = {}, overrides: readonly ConfigLayer[] = []) {
        const map = new Map<ConfigLayerName, ConfigLayer>()
        for (const name of LAYER_ORDER) {
            const layer = layers[name]
            if (layer && name !== "cli") map.set(name, layer)
        }
        this.layers = map
        this.overrides = layers.cli ? [layers.cli, ...overrides] : overrides
    }

    /**
     * A builder whose `defaults` layer holds every module's default options
     */
    public static fromDefaults(): ConfigBuilder {
        return new ConfigBuilder({ defaults: SystemConfigSchema.parse({}) })
    }

    public layer(name: ConfigLayerName): ConfigLayer | undefined {
        if (name !== "cli") return this.layers.get(name)
        if (this.overrides.length === 0) return undefined
        return this.overrides.reduce<ConfigLayer>((layer, override) => mergeLayers(layer, override), {})
    }

    /**
     * Returns a new builder with `name` replaced by `layer`
     */
    public withLayer(name: ConfigLayerName, layer: ConfigLayer): ConfigBuilder {
        const next: Partial<Record<ConfigLayerName, ConfigLayer>> = {}
        for (const [key, value] of this.layers) next[key] = value
        next[name] = layer
        return new ConfigBuilder(next, name === "cli" ? [] : this.overrides)
    }

    /**
     * Returns a new builder with one more override in the `cli` layer.
     * Overrides apply one after another, so a null in an earlier one
     * still deletes the lower layers' value.
     */
    public extend(overrides: ConfigLayer): ConfigBuilder {
        const next: Partial<Record<ConfigLayerName, ConfigLayer>> = {}
        for (const [key, value] of this.layers) next[key] = value
        return new ConfigBuilder(next, [...this.overrides, overrides])
    }

    public merged(): ConfigLayer {
        let result: ConfigLayer = {}
        for (const name of LAYER_ORDER) {
            const layer = this.layers.get(name)
            if (layer) result = mergeLayers(result, layer)
        }
        for (const override of this.overrides) {
            result = mergeLayers(result, override)
        }
        return result
    }

    /**
     * Merges all layers and validates the result
     */
    public build(): SystemConfig {
        const result = SystemConfigSchema.safeParse(this.merged())
        if (!result.success) {
            throw new ConfigValidationError(formatIssues(result.error))
        }
        return result.data
    }
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
}
