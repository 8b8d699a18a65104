/***
 *
 *
 *  Build Bridge Client
 *
 *  Writes a rebuild request into the shared directory and waits for the
 *  daemon's response.
 *
 */

import { join } from "path"
import { mkdir, readFile, rm, writeFile } from "fs/promises"
import { Logger } from "../../utils/log"
import { directoryExists, fileExists } from "../../utils/path"
import { BridgeResponseSchema, type BridgeResponse, type RebuildConfig } from "../../types/bridge"
import { SystemClock, type Clock } from "../test/watcher"

export interface SubmitOptions {
    sharedDir: string
    timeoutMs: number
    requestId?: string
    clock?: Clock
    pollIntervalMs?: number
}

export function generateRequestId(now = Date.now()): string {
    return `rebuild-${process.pid}-${now}`
}

export async function writeRequest(sharedDir: string, requestId: string, config: RebuildConfig): Promise<string> {
    const requestsDir = join(sharedDir, "requests")
    await mkdir(requestsDir, { recursive: true })
    const path = join(requestsDir, `${requestId}.json`)
    await writeFile(path, JSON.stringify({ requestId, config }, null, 2) + "\n")
    return path
}

/**
 * Reads a response file, or null while it is absent or still being written
 */
export async function readResponse(path: string): Promise<BridgeResponse | null> {
    if (!fileExists(path)) return null
    const text = await readFile(path, "utf-8")
    if (!text.trim()) return null

    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (err) {
        Logger.debug(`Response file incomplete, retrying: ${err instanceof Error ? err.message : String(err)}`)
        return null
    }
    return BridgeResponseSchema.parse(raw)
}

export async function submitRequest(config: RebuildConfig, options: SubmitOptions): Promise<BridgeResponse> {
    const clock = options.clock ?? SystemClock
    const pollIntervalMs = options.pollIntervalMs ?? 500

    if (!directoryExists(options.sharedDir)) {
        throw new Error(`Shared directory not available at ${options.sharedDir}`)
    }

    const requestId = options.requestId ?? generateRequestId(clock.now())
    const requestPath = await writeRequest(options.sharedDir, requestId, config)
    Logger.info(`Request ${requestId} written to ${requestPath}`)

    const responsePath = join(options.sharedDir, "responses", `${requestId}.json`)
    const start = clock.now()

    for (;;) {
        const response = await readResponse(responsePath)
        if (response) {
            await rm(responsePath, { force: true })
            return response
        }

        if (clock.now() - start >= options.timeoutMs) {
            throw new Error(`Timed out waiting for host response after ${Math.round(options.timeoutMs / 1000)}s\nExpected: ${responsePath}\nIs the build bridge daemon running on the host?`)
        }
        await clock.sleep(pollIntervalMs)
    }
}
