/***
 *
 *
 *  Project YAML (redox.yaml) Validation Schema
 *
 */

import { z } from "zod"
import { readFileSync } from "fs"
import { parse as parseYaml } from "yaml"
import { Settings } from "../settings"
import { Logger } from "../utils/log"
import { fileExists } from "../utils/path"

// Firmware used by the VM runners
const VmmFirmwareSchema = z.object({
    cloudHypervisor: z.string().optional(),
    ovmf: z.string().optional(),
})

// Module overrides are validated later, once all layers are merged
const ModuleOverridesSchema = z.record(z.unknown())

export const RedoxYamlSchema = z.object({
    name: z.string().min(1),
    profile: z.string().optional(),
    packages: z.string().optional(),
    output: z.string().optional(),
    modules: ModuleOverridesSchema.optional(),
    tools: z.record(z.string()).optional(),
    firmware: VmmFirmwareSchema.optional(),
})

export type RedoxYaml = z.infer<typeof RedoxYamlSchema>

export class RedoxYamlValidator {

    public static schema = RedoxYamlSchema

    /**
     * Validates redox.yaml and returns true if valid, false otherwise
     */
    public static validate(filePath?: string): boolean {
        return this.safeValidate(filePath).success
    }

    /**
     * Safely validates redox.yaml and returns a result object
     */
    public static safeValidate(filePath?: string): {
        success: boolean
        data?: RedoxYaml
        error?: z.ZodError | Error
    } {
        const yamlPath = filePath ?? Settings.projectFile

        if (!fileExists(yamlPath)) {
            return {
                success: false,
                error: new Error(`redox.yaml file not found: ${yamlPath}`),
            }
        }

        try {
            const parsed: unknown = parseYaml(readFileSync(yamlPath, "utf-8"))
            const result = RedoxYamlSchema.safeParse(parsed)

            if (result.success) {
                return { success: true, data: result.data }
            }

            return { success: false, error: result.error }
        } catch (error) {
            return {
                success: false,
                error: error instanceof Error
                    ? error
                    : new Error(`Failed to parse YAML: ${String(error)}`),
            }
        }
    }

    /**
     * Validates redox.yaml and loads it into Settings.
     * Exits the process when the file is missing or invalid.
     */
    public static validateAndLoad(filePath?: string): RedoxYaml {
        const yamlPath = filePath ?? Settings.projectFile

        if (!fileExists(yamlPath)) {
            return Logger.errorWithExit(`redox.yaml file not found: ${yamlPath}`)
        }

        try {
            const parsed: unknown = parseYaml(readFileSync(yamlPath, "utf-8"))
            const validated = RedoxYamlSchema.parse(parsed)
            Settings.main = validated
            return validated
        } catch (error) {
            if (error instanceof z.ZodError) {
                Logger.error("redox.yaml validation failed:")
                error.issues.forEach((issue: z.ZodIssue) => {
                    Logger.error(`  ${issue.path.join(".")}: ${issue.message}`)
                })
                return Logger.errorWithExit("Please fix the errors in redox.yaml and try again.")
            }

            const errorMessage = error instanceof Error ? error.message : String(error)
            return Logger.errorWithExit(`Failed to parse redox.yaml: ${errorMessage}`)
        }
    }

}
