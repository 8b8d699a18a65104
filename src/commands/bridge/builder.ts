/***
 *
 *
 *  Bridge Root Tree Builder
 *
 *  Builds the root tree of the project with a request's overrides on top
 *  of the usual layers.
 *
 */

import { join } from "path"
import { loadProject } from "../../config/project"
import { evaluateBuilder } from "../../config/evaluate"
import { stageRootTree } from "../build/root-tree"
import type { RebuildConfig } from "../../types/bridge"
import type { RootTreeBuild, RootTreeBuilder } from "./daemon"
import { rebuildConfigLayer } from "./translate"

export class ProjectRootTreeBuilder implements RootTreeBuilder {

    constructor(private readonly profile: string) {}

    public async buildRootTree(config: RebuildConfig, outputDir: string): Promise<RootTreeBuild> {
        const { builder, packages } = await loadProject({ profile: this.profile })
        const system = evaluateBuilder(builder.extend(rebuildConfigLayer(config)), packages, this.profile)

        const result = await stageRootTree(system, packages, join(outputDir, "root-tree"))
        return { rootTree: result.path, manifest: result.manifest }
    }
}

export function bridgeProfileFromEnv(): string {
    return process.env.REDOX_PROFILE ?? "development"
}
