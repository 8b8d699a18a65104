/***
 *
 *
 *  Project Loading
 *
 *  Reads redox.yaml and the package index, then evaluates the system for
 *  the active profile with any --set overrides.
 *
 */

import { Settings } from "../settings"
import { Logger } from "../utils/log"
import { RedoxYamlValidator } from "../types/redox-yaml"
import { loadPackageSet, type PackageSet } from "../types/packages"
import { parseSetFlag, type ConfigBuilder, type ConfigLayer } from "./builder"
import { createSystemBuilder, evaluateBuilder, type EvaluatedSystem } from "./evaluate"

export interface ProjectOptions {
    profile?: string
    set?: string[]
}

export interface LoadedProject {
    packages: PackageSet
    builder: ConfigBuilder
    system: EvaluatedSystem
}

/**
 * One override per --set flag, kept apart so each applies to the result of the one before
 */
export function cliOverrides(assignments: string[] = []): ConfigLayer[] {
    return assignments.map(assignment => parseSetFlag(assignment))
}

export async function loadProject(options: ProjectOptions = {}): Promise<LoadedProject> {
    if (options.profile) Settings.profile = options.profile
    const yaml = Settings.main ?? RedoxYamlValidator.validateAndLoad()

    const packages = await loadPackageSet(Settings.packagesDir)
    Logger.debug(`Loaded ${packages.names().length} packages from ${Settings.packagesDir}`)

    const profile = Settings.activeProfile
    const builder = cliOverrides(options.set).reduce(
        (current, override) => current.extend(override),
        createSystemBuilder({ profile, packages, user: yaml.modules }),
    )

    const system = evaluateBuilder(builder, packages, profile)
    for (const warning of system.warnings) {
        Logger.warning(warning)
    }

    return { packages, builder, system }
}
