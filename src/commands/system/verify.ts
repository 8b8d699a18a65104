/***
 *
 *
 *  File Inventory Verification
 *
 */

import { join } from "path"
import { computeFileHash } from "../../utils/files"
import type { Manifest } from "../../types/manifest"
import { sortedEntries } from "../../config/plan"

export interface VerifyResult {
    verified: number
    modified: number
    missing: number
    lines: string[]
    ok: boolean
}

/**
 * Checks every tracked file of a manifest against the tree below root
 */
export async function verifyTree(manifest: Manifest, root: string, options: { verbose?: boolean } = {}): Promise<VerifyResult> {
    const tracked = sortedEntries(manifest.files)

    if (tracked.length === 0) {
        return {
            verified: 0,
            modified: 0,
            missing: 0,
            lines: ["warning: manifest has no file inventory, nothing to verify"],
            ok: true,
        }
    }

    const lines = [`Verifying ${tracked.length} tracked files...`, ""]
    const issues: string[] = []
    let verified = 0
    let modified = 0
    let missing = 0

    for (const [path, expected] of tracked) {
        const actual = await computeFileHash(join(root, path))
        if (actual === null) {
            missing++
            issues.push(`  MISSING  ${path}`)
        } else if (actual !== expected.hash) {
            modified++
            issues.push(`  CHANGED  ${path}  (expected ${expected.hash.slice(0, 12)}…, got ${actual.slice(0, 12)}…)`)
        } else {
            verified++
            if (options.verbose) lines.push(`  OK       ${path}`)
        }
    }

    lines.push("Results:", `  Verified:  ${verified}`)
    if (modified > 0) lines.push(`  Modified:  ${modified}`)
    if (missing > 0) lines.push(`  Missing:   ${missing}`)

    if (issues.length > 0) {
        lines.push("", "Issues:", ...issues, "", `${modified + missing} file(s) failed verification (${modified} modified, ${missing} missing)`)
        return { verified, modified, missing, lines, ok: false }
    }

    lines.push("", `All ${verified} files verified successfully.`)
    return { verified, modified, missing, lines, ok: true }
}
