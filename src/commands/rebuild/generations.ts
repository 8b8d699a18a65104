/***
 *
 *
 *  Rebuild Generations
 *
 *  .redox-generations/
 *      system-1-link -> <output>/systems/<hash>
 *      system-2-link -> ...
 *      system        -> current toplevel
 *
 */

import { join, resolve } from "path"
import { lstat, mkdir, readdir, realpath } from "fs/promises"
import { forceSymlink } from "../../utils/files"
import { directoryExists, symlinkExists } from "../../utils/path"

export const GENERATION_LINK = /^system-(\d+)-link$/

export interface GenerationLink {
    number: number
    link: string
    toplevel: string
    // mtime of the link itself
    date: Date
}

export type GenerationUpdate =
    | { created: false, toplevel: string }
    | { created: true, number: number, toplevel: string }

export function generationsDirFromEnv(projectPath: string): string {
    return resolve(projectPath, process.env.REDOX_GENERATIONS ?? ".redox-generations")
}

/**
 * Generation links sorted by number. Dangling links are left out.
 */
export async function listGenerationLinks(dir: string): Promise<GenerationLink[]> {
    if (!directoryExists(dir)) return []

    const links: GenerationLink[] = []
    for (const name of await readdir(dir)) {
        const match = GENERATION_LINK.exec(name)
        if (!match) continue
        const link = join(dir, name)
        if (!symlinkExists(link)) continue

        try {
            links.push({
                number: Number(match[1]),
                link,
                toplevel: await realpath(link),
                date: (await lstat(link)).mtime,
            })
        } catch (err) {
            if (isMissing(err)) continue
            throw err
        }
    }

    return links.sort((a, b) => a.number - b.number)
}

/**
 * Resolved toplevel of the `system` link, or null before the first build
 */
export async function currentGeneration(dir: string): Promise<string | null> {
    const link = join(dir, "system")
    if (!symlinkExists(link)) return null
    try {
        return await realpath(link)
    } catch (err) {
        if (isMissing(err)) return null
        throw err
    }
}

export function nextGenerationNumber(links: GenerationLink[]): number {
    return links.reduce((max, link) => Math.max(max, link.number), 0) + 1
}

/**
 * Points `system` at a freshly built toplevel, adding a generation unless it is already current
 */
export async function recordGeneration(dir: string, toplevel: string): Promise<GenerationUpdate> {
    await mkdir(dir, { recursive: true })
    const resolved = await realpath(toplevel)

    if (await currentGeneration(dir) === resolved) {
        return { created: false, toplevel: resolved }
    }

    const number = nextGenerationNumber(await listGenerationLinks(dir))
    await forceSymlink(resolved, join(dir, `system-${number}-link`))
    await forceSymlink(resolved, join(dir, "system"))
    return { created: true, number, toplevel: resolved }
}

export class GenerationNotFoundError extends Error {
    constructor(public readonly number: number, public readonly available: number[]) {
        super(`Generation ${number} not found.`)
        this.name = "GenerationNotFoundError"
    }
}

/**
 * Repoints `system` to generation `target`, or to the one before the current generation.
 * Returns the generation switched to.
 */
export async function rollbackGeneration(dir: string, target?: number): Promise<GenerationLink> {
    if (!directoryExists(dir)) throw new Error("No generations found.")
    const links = await listGenerationLinks(dir)

    let chosen: GenerationLink | undefined
    if (target !== undefined) {
        chosen = links.find(link => link.number === target)
        if (!chosen) throw new GenerationNotFoundError(target, links.map(link => link.number))
    } else {
        const current = await currentGeneration(dir)
        const index = links.findIndex(link => link.toplevel === current)
        // Without a current generation every link counts as earlier
        const earlier = index === -1 ? links : links.slice(0, index)
        chosen = earlier.at(-1)
        if (!chosen) throw new Error("No previous generation to roll back to.")
    }

    await forceSymlink(chosen.toplevel, join(dir, "system"))
    return chosen
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT"
}
