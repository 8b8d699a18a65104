/***
 *
 *
 *  Build Bridge Protocol
 *
 *  Requests and responses are JSON files exchanged through a directory
 *  shared between the host and a running guest:
 *
 *      requests/<id>.json     written by the guest
 *      responses/<id>.json    written by the host
 *
 */

import { z } from "zod"
import { ManifestSchema } from "./manifest"

// Sections are checked against the module schemas once they are merged
const SectionSchema = z.record(z.unknown())

export const RebuildConfigSchema = z.object({
    hostname: z.string().optional(),
    timezone: z.string().optional(),
    packages: z.array(z.string()).optional(),
    networking: SectionSchema.optional(),
    graphics: SectionSchema.optional(),
    security: SectionSchema.optional(),
    logging: SectionSchema.optional(),
    power: SectionSchema.optional(),
    users: z.record(SectionSchema).optional(),
    programs: SectionSchema.optional(),
})

export const BridgeRequestSchema = z.object({
    requestId: z.string().regex(/^[A-Za-z0-9._-]+$/, "Request ids may only contain letters, digits, dots, dashes and underscores"),
    config: RebuildConfigSchema.default({}),
})

export const BridgeSuccessSchema = z.object({
    status: z.literal("success"),
    requestId: z.string(),
    rootTree: z.string(),
    manifest: ManifestSchema.nullable(),
    buildTimeMs: z.number().int().nonnegative(),
})

export const BridgeErrorSchema = z.object({
    status: z.literal("error"),
    requestId: z.string(),
    error: z.string(),
})

export const BridgeResponseSchema = z.discriminatedUnion("status", [BridgeSuccessSchema, BridgeErrorSchema])

export type RebuildConfig = z.infer<typeof RebuildConfigSchema>
export type BridgeRequest = z.infer<typeof BridgeRequestSchema>
export type BridgeResponse = z.infer<typeof BridgeResponseSchema>
export type BridgeSuccess = z.infer<typeof BridgeSuccessSchema>
