/***
 *
 *  Redox Forge Version Detection
 *
 */

const envVersion = process.env.REDOX_FORGE_VERSION?.trim()

// Default to the development version when no build-time override is provided
export const REDOX_FORGE_VERSION = envVersion && envVersion.length > 0 ? envVersion : "0.1.0"

// Version of the system layout written into manifests and version.json
export const REDOX_SYSTEM_VERSION = "0.2.0"

export const REDOX_TARGET = "x86_64-unknown-redox"
