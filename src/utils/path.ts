/***
 *
 *  Path Utility Functions
 *
 */

import { statSync, lstatSync, existsSync, accessSync, constants } from "node:fs"

// Checks if a File Exists
export function fileExists(path: string): boolean {
    try {
        const stats = statSync(path)
        return stats.isFile()
    } catch {
        return false
    }
}

// Checks if a directory exists
export function directoryExists(path: string): boolean {
    try {
        const stats = statSync(path)
        return stats.isDirectory()
    } catch {
        return false
    }
}

// Checks if a path exists (file or directory)
export function pathExists(path: string): boolean {
    return existsSync(path)
}

// Checks for a symlink without following it
export function symlinkExists(path: string): boolean {
    try {
        return lstatSync(path).isSymbolicLink()
    } catch {
        return false
    }
}

export function isWritable(path: string): boolean {
    try {
        accessSync(path, constants.W_OK)
        return true
    } catch {
        return false
    }
}
