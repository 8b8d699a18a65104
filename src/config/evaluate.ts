/***
 *
 *
 *  System Evaluation
 *
 *  defaults → profile → user (redox.yaml modules) → cli (--set flags)
 *
 */

import { ConfigBuilder, type ConfigLayer } from "./builder"
import { getProfile } from "./profiles"
import { failedAssertions, collectWarnings } from "./assertions"
import { createBuildPlan, type BuildPlan } from "./plan"
import type { SystemConfig } from "../types/modules"
import type { PackageSet } from "../types/packages"

export class ConfigEvaluationError extends Error {
    constructor(public readonly failures: string[]) {
        super(`Failed assertions:\n${failures.map(failure => `  - ${failure}`).join("\n")}`)
        this.name = "ConfigEvaluationError"
    }
}

export interface EvaluatedSystem {
    profile: string
    config: SystemConfig
    plan: BuildPlan
    warnings: string[]
}

export interface EvaluateOptions {
    profile: string
    packages: PackageSet
    user?: ConfigLayer
    cli?: ConfigLayer
}

/**
 * Creates the layered builder for a profile, before any evaluation happens
 */
export function createSystemBuilder(options: EvaluateOptions): ConfigBuilder {
    const profile = getProfile(options.profile)
    let builder = ConfigBuilder.fromDefaults()
        .withLayer("profile", profile.layer(options.packages))

    if (options.user) builder = builder.withLayer("user", options.user)
    if (options.cli) builder = builder.withLayer("cli", options.cli)

    return builder
}

/**
 * Validates the merged configuration, checks every assertion and derives the build plan
 */
export function evaluateBuilder(builder: ConfigBuilder, packages: PackageSet, profile: string): EvaluatedSystem {
    const config = builder.build()

    const failures = failedAssertions(config, packages)
    if (failures.length > 0) {
        throw new ConfigEvaluationError(failures)
    }

    const canonical = getProfile(profile).name
    return {
        profile: canonical,
        config,
        plan: createBuildPlan(config, packages, canonical),
        warnings: collectWarnings(config),
    }
}

export function evaluateSystem(options: EvaluateOptions): EvaluatedSystem {
    return evaluateBuilder(createSystemBuilder(options), options.packages, options.profile)
}
