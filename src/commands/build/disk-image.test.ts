import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import type { CommandResult, CommandRunner, RunnerOptions } from "../../utils/run"
import { assembleDiskImage, computeGeometry } from "./disk-image"

class RecordingRunner implements CommandRunner {

    public readonly calls: { command: string, args: string[], cwd?: string }[] = []

    public async runCommand(command: string, args: string[], options: RunnerOptions): Promise<CommandResult> {
        this.calls.push({ command, args, cwd: options.cwd })
        return { exitCode: 0, stdout: "", stderr: "" }
    }
}

describe("computeGeometry", () => {
    it("places RedoxFS after the ESP and before the backup GPT", () => {
        expect(computeGeometry(512, 200)).toEqual({
            imageSize: 536870912,
            espSize: 209715200,
            espSectors: 409600,
            redoxfsStart: 411648,
            redoxfsEnd: 1048542,
            redoxfsSectors: 636894,
            redoxfsSize: 326089728,
        })
    })
})

describe("assembleDiskImage", () => {
    let base: string

    beforeEach(async () => {
        base = await mkdtemp(join(tmpdir(), "disk-image-"))
        await mkdir(join(base, "root", "etc"), { recursive: true })
        await writeFile(join(base, "root", "etc", "hostname"), "redox\n")
        await writeFile(join(base, "kernel"), "kernel")
        await writeFile(join(base, "initfs.img"), "initfs")
        await writeFile(join(base, "BOOTX64.EFI"), "efi")
    })

    afterEach(async () => {
        await rm(base, { recursive: true, force: true })
    })

    it("runs every host tool in the work directory", async () => {
        const runner = new RecordingRunner()
        const workDir = join(base, "disk")

        const image = await assembleDiskImage({
            kernel: join(base, "kernel"),
            bootloader: join(base, "BOOTX64.EFI"),
            initfs: join(base, "initfs.img"),
            rootTree: join(base, "root"),
            workDir,
            diskSizeMB: 512,
            espSizeMB: 200,
        }, runner, name => `/tools/${name}`)

        expect(image).toBe(join(workDir, "disk.img"))
        expect(runner.calls.every(call => call.cwd === workDir)).toBe(true)
        expect(runner.calls.map(call => [call.command, ...call.args].join(" "))).toEqual([
            "/tools/truncate -s 536870912 disk.img",
            "/tools/parted -s disk.img mklabel gpt",
            "/tools/parted -s disk.img mkpart ESP fat32 1MiB 201MiB",
            "/tools/parted -s disk.img set 1 boot on",
            "/tools/parted -s disk.img set 1 esp on",
            "/tools/parted -s disk.img mkpart RedoxFS 201MiB 100%",
            "/tools/truncate -s 209715200 esp.img",
            "/tools/mkfs.vfat -F 32 -n EFI esp.img",
            "/tools/mmd -i esp.img ::EFI ::EFI/BOOT",
            `/tools/mcopy -i esp.img ${join(base, "BOOTX64.EFI")} ::EFI/BOOT/`,
            `/tools/mcopy -i esp.img ${join(base, "kernel")} ::EFI/BOOT/kernel`,
            `/tools/mcopy -i esp.img ${join(base, "initfs.img")} ::EFI/BOOT/initfs`,
            "/tools/mcopy -i esp.img startup.nsh ::",
            "/tools/dd if=esp.img of=disk.img bs=512 seek=2048 conv=notrunc",
            "/tools/truncate -s 326089728 redoxfs.img",
            "/tools/redoxfs-ar --uid 0 --gid 0 redoxfs.img redoxfs-root",
            "/tools/dd if=redoxfs.img of=disk.img bs=512 seek=411648 conv=notrunc",
        ])

        expect(await readFile(join(workDir, "startup.nsh"), "utf-8")).toBe("\\EFI\\BOOT\\BOOTX64.EFI\n")
        expect(await readFile(join(workDir, "redoxfs-root", "boot", "kernel"), "utf-8")).toBe("kernel")
        expect(await readFile(join(workDir, "redoxfs-root", "etc", "hostname"), "utf-8")).toBe("redox\n")
    })
})
