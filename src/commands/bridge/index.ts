/***
 *
 *
 *  Bridge Command
 *
 */

import { readFile } from "fs/promises"
import { Logger } from "../../utils/log"
import { RebuildConfigSchema, type BridgeResponse } from "../../types/bridge"
import { BridgeDaemon, pollIntervalFromEnv, sharedDirFromEnv } from "./daemon"
import { ProjectRootTreeBuilder, bridgeProfileFromEnv } from "./builder"
import { submitRequest } from "./client"

export interface ServeOptions {
    sharedDir?: string
    profile?: string
}

export async function serveBridge(options: ServeOptions = {}): Promise<void> {
    const profile = options.profile ?? bridgeProfileFromEnv()
    const daemon = new BridgeDaemon({
        sharedDir: options.sharedDir ?? sharedDirFromEnv(),
        builder: new ProjectRootTreeBuilder(profile),
        pollIntervalMs: pollIntervalFromEnv(),
    })

    const controller = new AbortController()
    const stop = () => controller.abort()
    process.once("SIGINT", stop)
    process.once("SIGTERM", stop)

    Logger.info(`Profile: ${profile}`)
    try {
        await daemon.serve(controller.signal)
    } finally {
        process.off("SIGINT", stop)
        process.off("SIGTERM", stop)
    }
}

export interface SubmitCommandOptions {
    sharedDir?: string
    // Seconds
    timeout: number
}

/**
 * Sends the RebuildConfig in `configFile` to the daemon and prints the outcome
 */
export async function submitBridge(configFile: string, options: SubmitCommandOptions): Promise<BridgeResponse> {
    const config = RebuildConfigSchema.parse(JSON.parse(await readFile(configFile, "utf-8")))

    const response = await submitRequest(config, {
        sharedDir: options.sharedDir ?? sharedDirFromEnv(),
        timeoutMs: options.timeout * 1000,
    })

    if (response.status === "error") {
        throw new Error(`Host build failed:\n${response.error}`)
    }

    Logger.success(`Host build completed in ${(response.buildTimeMs / 1000).toFixed(1)}s`)
    Logger.info(`Root tree: ${response.rootTree}`)
    return response
}
