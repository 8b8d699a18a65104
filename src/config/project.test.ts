import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { loadPackageSet } from "../types/packages"
import { RedoxYamlValidator } from "../types/redox-yaml"
import { cliOverrides } from "./project"

describe("cliOverrides", () => {
    it("keeps one override per --set assignment", () => {
        expect(cliOverrides(["time.hostname=box", "environment.variables=null", "networking.dns=[9.9.9.9]"])).toEqual([
            { time: { hostname: "box" } },
            { environment: { variables: null } },
            { networking: { dns: ["9.9.9.9"] } },
        ])
        expect(cliOverrides()).toEqual([])
    })
})

describe("project files", () => {
    let dir: string

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "redox-project-"))
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it("resolves package paths against the index and follows aliases", async () => {
        await mkdir(join(dir, "packages"), { recursive: true })
        await writeFile(join(dir, "packages", "packages.json"), JSON.stringify({
            packages: [
                { name: "ion-shell", version: "1.0", path: "ion-shell" },
                { name: "redox-base", path: "../shared/base" },
            ],
        }))

        const packages = await loadPackageSet(join(dir, "packages"))

        expect(packages.names()).toEqual(["ion-shell", "redox-base"])
        expect(packages.get("ion").path).toBe(join(dir, "packages", "ion-shell"))
        expect(packages.get("base")).toEqual({ name: "redox-base", version: "", path: join(dir, "shared", "base") })
        expect(() => packages.get("bat")).toThrow("unknown package: bat (available: ion-shell, redox-base)")
    })

    it("reports a missing package index", async () => {
        await expect(loadPackageSet(dir)).rejects.toThrow(`Package index not found: ${join(dir, "packages.json")}`)
    })

    it("validates redox.yaml", async () => {
        const path = join(dir, "redox.yaml")
        await writeFile(path, "name: demo\nprofile: minimal\nmodules:\n  time:\n    hostname: demo\n")

        expect(RedoxYamlValidator.safeValidate(path)).toEqual({
            success: true,
            data: { name: "demo", profile: "minimal", modules: { time: { hostname: "demo" } } },
        })

        await writeFile(path, "profile: minimal\n")
        expect(RedoxYamlValidator.validate(path)).toBe(false)
        expect(RedoxYamlValidator.safeValidate(join(dir, "missing.yaml")).error?.message)
            .toBe(`redox.yaml file not found: ${join(dir, "missing.yaml")}`)
    })
})
