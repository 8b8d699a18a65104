import { describe, expect, it } from "vitest"
import { PackageSet } from "../types/packages"
import { ConfigBuilder } from "./builder"
import { failedAssertions } from "./assertions"
import { ConfigEvaluationError, evaluateSystem } from "./evaluate"
import { getProfile } from "./profiles"

const PACKAGES = new PackageSet(["ion-shell", "uutils", "redox-base", "netutils", "userutils"].map(name => ({
    name,
    version: "0.1.0",
    path: `/packages/${name}`,
})))

function evaluationFailures(run: () => unknown): string[] {
    try {
        run()
    } catch (err) {
        if (err instanceof ConfigEvaluationError) return err.failures
        throw err
    }
    return []
}

describe("assertions", () => {
    it("reports both disk size failures together", () => {
        const config = ConfigBuilder.fromDefaults().extend({ boot: { diskSizeMB: 100 } }).build()

        expect(failedAssertions(config, PACKAGES)).toEqual([
            "boot.diskSizeMB (100) must be greater than boot.espSizeMB (200)",
            "boot.diskSizeMB - boot.espSizeMB must leave at least 16 MB for RedoxFS (got -100 MB)",
        ])
    })

    it("requires room for RedoxFS after the ESP", () => {
        const tight = ConfigBuilder.fromDefaults().extend({ boot: { diskSizeMB: 210, espSizeMB: 200 } }).build()
        expect(failedAssertions(tight, PACKAGES)).toEqual([
            "boot.diskSizeMB - boot.espSizeMB must leave at least 16 MB for RedoxFS (got 10 MB)",
        ])

        const exact = ConfigBuilder.fromDefaults().extend({ boot: { diskSizeMB: 216, espSizeMB: 200 } }).build()
        expect(failedAssertions(exact, PACKAGES)).toEqual([])
    })

    it("names users sharing a uid", () => {
        const config = ConfigBuilder.fromDefaults()
            .extend({ users: { users: { alice: { uid: 1000, gid: 1000 } } } })
            .build()

        expect(failedAssertions(config, PACKAGES)).toEqual(["users.users: uid 1000 is used by alice, user"])
    })

    it("requires graphics packages for a graphical system", () => {
        const config = ConfigBuilder.fromDefaults().extend({ graphics: { enable: true } }).build()

        expect(failedAssertions(config, PACKAGES)).toEqual([
            "graphics.enable requires the orbital package, which is not in the package index",
        ])
    })
})

describe("evaluateSystem", () => {
    it("evaluates the minimal profile", () => {
        const system = evaluateSystem({ profile: "minimal", packages: PACKAGES })

        expect(system.profile).toBe("minimal")
        expect(system.config.environment.systemPackages).toEqual(["ion", "uutils"])
        expect(system.plan.packages.map(pkg => pkg.name)).toEqual(["ion-shell", "uutils", "redox-base"])
        expect(system.plan.userutilsInstalled).toBe(false)
        expect(system.plan.networkingEnabled).toBe(false)
        expect(system.plan.allDrivers).toEqual(["ahcid", "nvmed", "virtio-blkd", "e1000d", "virtio-netd"])
        expect(system.plan.pcidDrivers).toHaveLength(7)
        expect(system.plan.coreDaemons).not.toContain("smolnetd")
        expect(system.plan.defaultUser).toEqual({ name: "user", home: "/home/user" })
        expect(system.warnings).toEqual([])
    })

    it("resolves profile aliases and keeps only indexed packages", () => {
        const system = evaluateSystem({ profile: "default", packages: PACKAGES })

        expect(system.profile).toBe("development")
        expect(system.config.environment.systemPackages).toEqual(["ion", "uutils", "netutils", "userutils"])
        expect(system.plan.packages.map(pkg => pkg.name)).toEqual(["ion-shell", "uutils", "netutils", "userutils", "redox-base"])
        expect(system.plan.userutilsInstalled).toBe(true)
        expect(system.plan.coreDaemons[system.plan.coreDaemons.length - 1]).toBe("smolnetd")
        expect(system.warnings).toEqual([
            "networking.remoteShellEnable serves a root shell on port 8023 while security.allowRemoteRoot is false",
        ])
    })

    it("lets the user layer override the profile", () => {
        const system = evaluateSystem({
            profile: "development",
            packages: PACKAGES,
            user: { networking: { remoteShellEnable: false }, time: { hostname: "workstation" } },
            cli: { time: { hostname: "override" } },
        })

        expect(system.config.networking.remoteShellEnable).toBe(false)
        expect(system.config.time.hostname).toBe("override")
        expect(system.warnings).toEqual([])
    })

    it("collects failed assertions before planning", () => {
        const failures = evaluationFailures(() => evaluateSystem({
            profile: "minimal",
            packages: PACKAGES,
            user: { environment: { systemPackages: ["ripgrep"] } },
        }))

        expect(failures).toEqual(["environment.systemPackages: unknown package \"ripgrep\""])
        expect(new ConfigEvaluationError(failures).message)
            .toBe("Failed assertions:\n  - environment.systemPackages: unknown package \"ripgrep\"")
    })
})

describe("getProfile", () => {
    it("lists the known names for an unknown profile", () => {
        expect(getProfile("cloud").name).toBe("cloud-hypervisor")
        expect(() => getProfile("huge")).toThrow(
            "Unknown profile \"huge\" (available: cloud, cloud-hypervisor, default, development, functional-test, graphical, minimal)",
        )
    })

    it("configures a static interface for Cloud Hypervisor", () => {
        const system = evaluateSystem({ profile: "cloud-hypervisor", packages: PACKAGES })

        expect(system.config.networking.mode).toBe("static")
        expect(system.config.networking.interfaces).toEqual({
            "cloud-hypervisor": { address: "172.16.0.2", netmask: "255.255.255.0", gateway: "172.16.0.1" },
        })
        expect(system.plan.allDrivers).toEqual(["virtio-blkd", "virtio-netd"])
    })
})
