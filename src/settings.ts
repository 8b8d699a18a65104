/***
 *
 *
 *  Settings Store
 *
 */

import path from "path"
import { REDOX_FORGE_VERSION } from "./version"
import type { RedoxYaml } from "./types/redox-yaml"


export class SettingsConfig {

    verbose: boolean
    showTrace: boolean
    projectPath: string
    forgeVersion: string

    // Profile selected on the command line, falls back to redox.yaml
    profile: string | null = null

    main: RedoxYaml | null = null


    constructor() {

        // Default Verbosity
        this.verbose = false

        // Full stack traces on failure
        this.showTrace = false

        this.projectPath = process.cwd()

        this.forgeVersion = REDOX_FORGE_VERSION
    }

    public get projectFile(): string {
        return path.join(this.projectPath, "redox.yaml")
    }

    public get outputDir(): string {
        return path.resolve(this.projectPath, this.main?.output ?? "dist")
    }

    public get packagesDir(): string {
        return path.resolve(this.projectPath, this.main?.packages ?? "packages")
    }

    public get activeProfile(): string {
        return this.profile ?? this.main?.profile ?? "development"
    }

    // Host tool binary, honouring `tools:` overrides from redox.yaml
    public tool(name: string): string {
        return this.main?.tools?.[name] ?? name
    }

}


export const Settings = new SettingsConfig()
