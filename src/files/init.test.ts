import { describe, expect, it } from "vitest"
import { ConfigBuilder } from "../config/builder"
import { createBuildPlan } from "../config/plan"
import { ServiceSchema } from "../types/modules"
import { PackageSet } from "../types/packages"
import { PCID_TOML, initfsScripts, pcidEntry } from "./initfs"
import { STARTUP_SCRIPT, initScriptPath, initfsServiceLines, programInitScripts, rootfsServiceScripts, serviceLine } from "./services"

const PACKAGES = new PackageSet([
    { name: "redox-base", version: "0.1.0", path: "/packages/redox-base" },
    { name: "userutils", version: "0.1.0", path: "/packages/userutils" },
])

describe("pcid configuration", () => {
    it("quotes names and keeps numeric ids bare", () => {
        expect(pcidEntry({ name: "AHCI", class: "1", subclass: "6", command: "ahcid" })).toBe([
            "[[drivers]]",
            "name = \"AHCI\"",
            "class = 1",
            "subclass = 6",
            "command = [\"/scheme/initfs/lib/drivers/ahcid\"]",
            "",
        ].join("\n"))
    })

    it("lists every match of the planned drivers", () => {
        const config = ConfigBuilder.fromDefaults()
            .extend({ hardware: { storageDrivers: ["virtio-blkd"], networkDrivers: [] } })
            .build()
        const plan = createBuildPlan(config, PACKAGES, "minimal")

        expect(PCID_TOML(plan)).toBe([
            "# PCI drivers - generated by redox-forge",
            "[[drivers]]",
            "name = \"VirtIO Block Legacy\"",
            "vendor = 0x1AF4",
            "device = 0x1001",
            "command = [\"/scheme/initfs/lib/drivers/virtio-blkd\"]",
            "",
            "[[drivers]]",
            "name = \"VirtIO Block Modern\"",
            "vendor = 0x1AF4",
            "device = 0x1042",
            "command = [\"/scheme/initfs/lib/drivers/virtio-blkd\"]",
            "",
        ].join("\n"))
    })
})

describe("initfs init scripts", () => {
    it("skips graphics and hands over to the shell", () => {
        const config = ConfigBuilder.fromDefaults().build()
        const scripts = initfsScripts(config, createBuildPlan(config, new PackageSet([]), "minimal"))

        expect(scripts.map(([name]) => name)).toEqual(["00_runtime", "10_logging", "30_live", "40_drivers", "50_rootfs", "90_exit_initfs"])
        const exit = scripts[scripts.length - 1][1].trimEnd().split("\n")
        expect(exit.slice(-4)).toEqual(["export HOME /home/user", "export USER user", "export PATH /bin:/usr/bin", "/startup.sh"])
    })

    it("starts getty when userutils is installed", () => {
        const config = ConfigBuilder.fromDefaults().extend({ environment: { systemPackages: ["userutils"] } }).build()
        const scripts = initfsScripts(config, createBuildPlan(config, PACKAGES, "development"))

        expect(scripts[scripts.length - 1][1].trimEnd().split("\n").pop()).toBe("/bin/getty debug:")
    })

    it("runs initfs services before mounting the root filesystem", () => {
        const config = ConfigBuilder.fromDefaults()
            .extend({ services: { services: { audit: { command: "/bin/auditd", wantedBy: "initfs", description: "Audit log" } } } })
            .build()
        const scripts = initfsScripts(config, createBuildPlan(config, PACKAGES, "minimal"))

        expect(scripts.map(([name]) => name)).toContain("45_services")
        expect(initfsServiceLines(config)).toEqual(["# Audit log\nnotify /bin/auditd"])
    })

    it("adds graphics and ps2 when graphics boot is enabled", () => {
        const config = ConfigBuilder.fromDefaults().extend({ boot: { initfsEnableGraphics: true } }).build()
        const scripts = initfsScripts(config, createBuildPlan(config, PACKAGES, "minimal"))

        expect(scripts.map(([name]) => name)).toContain("20_graphics")
        expect(scripts.find(([name]) => name === "40_drivers")?.[1]).toBe(
            "# Hardware and PCI drivers\nnotify ps2d\nnotify hwd\nunset RSDP_ADDR RSDP_SIZE\npcid-spawner --initfs\n",
        )
    })
})

describe("services", () => {
    it("renders each service type", () => {
        expect(serviceLine("once", ServiceSchema.parse({ command: "/bin/setup", type: "oneshot", args: ["--fast"] }))).toBe("/bin/setup --fast")
        expect(serviceLine("web", ServiceSchema.parse({ command: "/bin/httpd" }))).toBe("notify /bin/httpd")
        expect(serviceLine("bg", ServiceSchema.parse({ command: "/bin/job", type: "nowait" }))).toBe("nowait /bin/job")
        expect(serviceLine("disk", ServiceSchema.parse({ command: "/bin/diskd", type: "scheme" }))).toBe("scheme disk /bin/diskd")
        expect(serviceLine("disk", ServiceSchema.parse({ command: "/bin/diskd", type: "scheme", scheme: "block" }))).toBe("scheme block /bin/diskd")
        expect(serviceLine("off", ServiceSchema.parse({ command: "/bin/off", enable: false }))).toBeNull()
    })

    it("writes one init script per enabled rootfs service", () => {
        const config = ConfigBuilder.fromDefaults()
            .extend({
                services: {
                    services: {
                        web: { command: "/bin/httpd" },
                        early: { command: "/bin/early", wantedBy: "initfs" },
                        off: { command: "/bin/off", enable: false },
                    },
                },
            })
            .build()

        expect(rootfsServiceScripts(config)).toEqual({ "50_web": { text: "notify /bin/httpd", directory: "init.d" } })
    })

    it("starts enabled programs", () => {
        const config = ConfigBuilder.fromDefaults()
            .extend({ graphics: { enable: true }, programs: { httpd: { enable: true, port: 8081 } } })
            .build()

        expect(programInitScripts(config, PACKAGES)).toEqual({
            "20_orbital": { text: "export VT 1\nnowait /bin/orbital /bin/login", directory: "usr/lib/init.d" },
            "30_httpd": { text: "echo \"Starting httpd on port 8081...\"\nnowait /bin/httpd --port 8081 --root /var/www", directory: "init.d" },
        })
    })

    it("places scripts by directory", () => {
        expect(initScriptPath("10_net", { text: "", directory: "init.d" })).toBe("etc/init.d/10_net")
        expect(initScriptPath("00_base", { text: "", directory: "/usr/lib/init.d/" })).toBe("usr/lib/init.d/00_base")
    })

    it("ends the startup script with a newline", () => {
        const config = ConfigBuilder.fromDefaults().extend({ services: { startupScriptText: "/bin/ion" } }).build()
        expect(STARTUP_SCRIPT(config)).toBe("#!/bin/sh\n/bin/ion\n")
    })
})
