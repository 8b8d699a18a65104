/***
 *
 *
 *  File Tree Utilities
 *
 *  Hashing and walking of staged trees (root tree, initfs, toplevel).
 *
 */

import { createHash } from "crypto"
import { join, dirname, relative, resolve, isAbsolute, sep } from "path"
import { readdir, readFile, lstat, mkdir, writeFile, chmod, copyFile, symlink, rm } from "fs/promises"
import { fileExists, symlinkExists } from "./path"

/**
 * Resolves `path` under `root`, throwing when it would land outside of it
 */
export function treePath(root: string, path: string): string {
    const target = resolve(root, path.replace(/^\/+/, ""))
    const rel = relative(resolve(root), target)
    if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new Error(`Path escapes the tree root: ${path}`)
    }
    return target
}

export interface TreeEntry {
    // Path relative to the tree root, always with forward slashes
    path: string
    absolutePath: string
    size: number
    mode: number
}

/**
 * Computes the SHA-256 of a buffer or string
 */
export function hashContent(content: Buffer | string): string {
    const hash = createHash("sha256")
    hash.update(content)
    return hash.digest("hex")
}

/**
 * Computes the SHA-256 of a file's contents.
 * Returns null if the file doesn't exist.
 */
export async function computeFileHash(filePath: string): Promise<string | null> {
    if (!fileExists(filePath)) return null
    return hashContent(await readFile(filePath))
}

/**
 * Recursively collects regular files below a directory, sorted by relative path.
 * Symlinks are not followed and not returned.
 */
export async function collectFilesRecursively(
    root: string,
    exclude: (relativePath: string) => boolean = () => false,
): Promise<TreeEntry[]> {
    const entries: TreeEntry[] = []

    async function walk(dir: string, prefix: string): Promise<void> {
        const children = await readdir(dir, { withFileTypes: true })
        for (const child of children) {
            const relativePath = prefix ? `${prefix}/${child.name}` : child.name
            if (exclude(relativePath)) continue
            const absolutePath = join(dir, child.name)
            if (child.isDirectory()) {
                await walk(absolutePath, relativePath)
            } else if (child.isFile()) {
                const stats = await lstat(absolutePath)
                entries.push({ path: relativePath, absolutePath, size: stats.size, mode: stats.mode & 0o7777 })
            }
        }
    }

    await walk(root, "")
    return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
}

// Writing through a staged symlink would land outside the tree
async function replaceSymlink(path: string): Promise<void> {
    if (symlinkExists(path)) await rm(path)
}

/**
 * Writes a text file, creating parent directories and applying an octal mode ("0755")
 */
export async function writeFileWithMode(path: string, content: string, mode = "0644"): Promise<void> {
    await mkdir(dirname(path), { recursive: true })
    await replaceSymlink(path)
    await writeFile(path, content)
    await chmod(path, parseInt(mode, 8))
}

/**
 * Copies a file if it exists, returns whether anything was copied
 */
export async function copyIfExists(source: string, destination: string): Promise<boolean> {
    if (!fileExists(source)) return false
    await mkdir(dirname(destination), { recursive: true })
    await replaceSymlink(destination)
    await copyFile(source, destination)
    await chmod(destination, (await lstat(source)).mode & 0o7777)
    return true
}

/**
 * Creates or replaces a symlink (ln -sfn)
 */
export async function forceSymlink(target: string, linkPath: string): Promise<void> {
    await mkdir(dirname(linkPath), { recursive: true })
    await rm(linkPath, { force: true })
    await symlink(target, linkPath)
}

export function formatMode(mode: number): string {
    return `0${(mode & 0o777).toString(8).padStart(3, "0")}`
}
