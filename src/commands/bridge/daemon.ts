/***
 *
 *
 *  Build Bridge Daemon
 *
 *  Serves rebuild requests a guest drops into the shared directory:
 *
 *      requests/<id>.json        pending request
 *      requests/<id>.json.lock   request being built
 *      requests/.<id>.done       finished request
 *      requests/.<id>.failed     request whose response could not be written
 *      responses/<id>.json       build result
 *      cache/<id>/root-tree      staged root tree of a successful build
 *
 *  Requests are picked up by a chokidar watcher, with a polling loop as
 *  fallback for shares that deliver no file events. One request is built
 *  at a time.
 *
 */

import { basename, join } from "path"
import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises"
import chokidar from "chokidar"
import { Logger } from "../../utils/log"
import { fileExists } from "../../utils/path"
import { BridgeRequestSchema, type BridgeResponse, type RebuildConfig } from "../../types/bridge"
import type { Manifest } from "../../types/manifest"
import { SystemClock, type Clock } from "../test/watcher"
import { summarizeRebuildConfig } from "./translate"

export const DEFAULT_SHARED_DIR = "/tmp/redox-shared"
// Lines of build output kept in an error response
const ERROR_LINES = 20

export interface RootTreeBuild {
    rootTree: string
    manifest: Manifest | null
}

export interface RootTreeBuilder {
    buildRootTree(config: RebuildConfig, outputDir: string): Promise<RootTreeBuild>
}

export interface BridgeDaemonOptions {
    sharedDir: string
    builder: RootTreeBuilder
    clock?: Clock
    pollIntervalMs?: number
}

export function sharedDirFromEnv(): string {
    return process.env.REDOX_SHARED_DIR ?? DEFAULT_SHARED_DIR
}

export function pollIntervalFromEnv(): number {
    const seconds = Number(process.env.POLL_INTERVAL ?? "1")
    return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 1000
}

function isRequestFile(name: string): boolean {
    return name.endsWith(".json") && !name.startsWith(".")
}

function errorMessage(err: unknown): string {
    const message = err instanceof Error ? err.message : String(err)
    return message.split("\n").slice(0, ERROR_LINES).join("\n")
}

export class BridgeDaemon {

    private readonly clock: Clock
    private readonly pollIntervalMs: number
    private draining = false
    private drainAgain = false

    constructor(private readonly options: BridgeDaemonOptions) {
        this.clock = options.clock ?? SystemClock
        this.pollIntervalMs = options.pollIntervalMs ?? 1000
    }

    public get requestsDir(): string {
        return join(this.options.sharedDir, "requests")
    }

    public get responsesDir(): string {
        return join(this.options.sharedDir, "responses")
    }

    public get cacheDir(): string {
        return join(this.options.sharedDir, "cache")
    }

    public async prepare(): Promise<void> {
        for (const dir of [this.requestsDir, this.responsesDir, this.cacheDir]) {
            await mkdir(dir, { recursive: true })
        }
    }

    /**
     * Request files waiting to be built, oldest name first
     */
    public async pendingRequests(): Promise<string[]> {
        const names = await readdir(this.requestsDir)
        return names
            .filter(isRequestFile)
            .filter(name => !fileExists(join(this.requestsDir, `${name}.lock`)))
            .sort()
            .map(name => join(this.requestsDir, name))
    }

    /**
     * Builds one request and writes its response. A request whose response
     * cannot be written is moved aside as `.<id>.failed`.
     */
    public async processRequest(requestFile: string): Promise<BridgeResponse> {
        const requestId = basename(requestFile, ".json")
        const lock = `${requestFile}.lock`
        await writeFile(lock, "")

        try {
            const response = await this.build(requestFile, requestId)
            try {
                await writeFile(join(this.responsesDir, `${requestId}.json`), JSON.stringify(response, null, 2) + "\n", { mode: 0o644 })
                await rename(requestFile, join(this.requestsDir, `.${requestId}.done`))
            } catch (err) {
                Logger.error(`Could not answer ${requestId}: ${errorMessage(err)}`)
                await this.setAside(requestFile, requestId)
            }
            return response
        } finally {
            await rm(lock, { force: true })
        }
    }

    private async setAside(requestFile: string, requestId: string): Promise<void> {
        try {
            await rename(requestFile, join(this.requestsDir, `.${requestId}.failed`))
        } catch (err) {
            Logger.error(`Could not move ${requestId} aside: ${errorMessage(err)}`)
        }
    }

    private async build(requestFile: string, requestId: string): Promise<BridgeResponse> {
        Logger.info(`Building: ${requestId}`)
        const start = this.clock.now()

        try {
            const parsed = BridgeRequestSchema.safeParse(JSON.parse(await readFile(requestFile, "utf-8")))
            if (!parsed.success) {
                const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                throw new Error(`Invalid request:\n${issues.join("\n")}`)
            }

            if (parsed.data.requestId !== requestId) {
                throw new Error(`Request id "${parsed.data.requestId}" does not match its file name "${requestId}.json"`)
            }

            Logger.debug(`Request ${requestId}: ${summarizeRebuildConfig(parsed.data.config)}`)
            const result = await this.options.builder.buildRootTree(parsed.data.config, join(this.cacheDir, requestId))
            Logger.success(`Build OK: ${result.rootTree}`)

            return {
                status: "success",
                requestId,
                rootTree: result.rootTree,
                manifest: result.manifest,
                buildTimeMs: Math.max(0, Math.round(this.clock.now() - start)),
            }
        } catch (err) {
            Logger.error(`Build failed: ${requestId}`)
            return { status: "error", requestId, error: errorMessage(err) }
        }
    }

    /**
     * Builds every pending request in turn and returns how many were served
     */
    public async processPending(): Promise<number> {
        let served = 0
        for (const requestFile of await this.pendingRequests()) {
            // Another pass may have finished it in the meantime
            if (!fileExists(requestFile)) continue
            await this.processRequest(requestFile)
            served++
        }
        return served
    }

    private async drain(): Promise<void> {
        if (this.draining) {
            this.drainAgain = true
            return
        }
        this.draining = true
        try {
            do {
                this.drainAgain = false
                await this.processPending()
            } while (this.drainAgain)
        } finally {
            this.draining = false
        }
    }

    /**
     * Watches for requests until `signal` aborts
     */
    public async serve(signal: AbortSignal): Promise<void> {
        await this.prepare()

        Logger.title("redox build bridge")
        Logger.info(`Shared: ${this.options.sharedDir}`)
        Logger.log("Waiting for build requests...")

        const watcher = chokidar.watch(this.requestsDir, { depth: 0, ignoreInitial: true, persistent: true })
        watcher.on("add", (path: string) => {
            if (!isRequestFile(basename(path))) return
            this.drain().catch((err: unknown) => Logger.error(`Bridge request failed: ${errorMessage(err)}`))
        })

        try {
            while (!signal.aborted) {
                await this.drain().catch((err: unknown) => Logger.error(`Bridge request failed: ${errorMessage(err)}`))
                await this.clock.sleep(this.pollIntervalMs)
            }
        } finally {
            await watcher.close()
        }
    }
}
