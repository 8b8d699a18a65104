/***
 *
 *
 *  Disk Image Assembly
 *
 *  GPT layout:
 *
 *      sector 2048          FAT32 ESP   EFI/BOOT/{BOOTX64.EFI,kernel,initfs}, startup.nsh
 *      2048 + ESP sectors   RedoxFS     root tree + boot/{kernel,initfs}
 *
 *  Every step is a host tool run through the CommandRunner. Any failure
 *  aborts the image.
 *
 */

import { join } from "path"
import { cp, mkdir, rm } from "fs/promises"
import { copyIfExists, writeFileWithMode } from "../../utils/files"
import type { CommandRunner } from "../../utils/run"

const SECTOR_SIZE = 512
const ESP_START_SECTOR = 2048
// Backup GPT header and partition entries at the end of the disk
const GPT_BACKUP_SECTORS = 34
const MIB = 1024 * 1024

export interface DiskGeometry {
    imageSize: number
    espSize: number
    espSectors: number
    redoxfsStart: number
    redoxfsEnd: number
    redoxfsSectors: number
    redoxfsSize: number
}

export function computeGeometry(diskSizeMB: number, espSizeMB: number): DiskGeometry {
    const imageSize = diskSizeMB * MIB
    const espSize = espSizeMB * MIB
    const espSectors = espSize / SECTOR_SIZE
    const redoxfsStart = ESP_START_SECTOR + espSectors
    const redoxfsEnd = imageSize / SECTOR_SIZE - GPT_BACKUP_SECTORS
    const redoxfsSectors = redoxfsEnd - redoxfsStart

    return {
        imageSize,
        espSize,
        espSectors,
        redoxfsStart,
        redoxfsEnd,
        redoxfsSectors,
        redoxfsSize: redoxfsSectors * SECTOR_SIZE,
    }
}

export interface DiskImageInputs {
    kernel: string
    bootloader: string
    initfs: string
    rootTree: string
    workDir: string
    diskSizeMB: number
    espSizeMB: number
}

export type ToolResolver = (name: string) => string

/**
 * Builds the disk image in workDir and returns its path
 */
export async function assembleDiskImage(inputs: DiskImageInputs, runner: CommandRunner, tool: ToolResolver): Promise<string> {
    const { workDir, diskSizeMB, espSizeMB } = inputs
    const geometry = computeGeometry(diskSizeMB, espSizeMB)
    const espEnd = `${espSizeMB + 1}MiB`

    await rm(workDir, { recursive: true, force: true })
    await mkdir(workDir, { recursive: true })

    const run = async (command: string, args: string[], message: string): Promise<void> => {
        await runner.runCommand(tool(command), args, { message, cwd: workDir, quiet: true })
    }

    // Partition table
    await run("truncate", ["-s", String(geometry.imageSize), "disk.img"], "Allocating disk image...")
    await run("parted", ["-s", "disk.img", "mklabel", "gpt"], "Writing GPT...")
    await run("parted", ["-s", "disk.img", "mkpart", "ESP", "fat32", "1MiB", espEnd], "Creating ESP partition...")
    await run("parted", ["-s", "disk.img", "set", "1", "boot", "on"], "Marking ESP bootable...")
    await run("parted", ["-s", "disk.img", "set", "1", "esp", "on"], "Flagging ESP...")
    await run("parted", ["-s", "disk.img", "mkpart", "RedoxFS", espEnd, "100%"], "Creating RedoxFS partition...")

    // EFI system partition
    await run("truncate", ["-s", String(geometry.espSize), "esp.img"], "Allocating ESP...")
    await run("mkfs.vfat", ["-F", "32", "-n", "EFI", "esp.img"], "Formatting ESP...")
    await run("mmd", ["-i", "esp.img", "::EFI", "::EFI/BOOT"], "Creating EFI directories...")
    await run("mcopy", ["-i", "esp.img", inputs.bootloader, "::EFI/BOOT/"], "Copying bootloader...")
    await run("mcopy", ["-i", "esp.img", inputs.kernel, "::EFI/BOOT/kernel"], "Copying kernel...")
    await run("mcopy", ["-i", "esp.img", inputs.initfs, "::EFI/BOOT/initfs"], "Copying initfs...")
    await writeFileWithMode(join(workDir, "startup.nsh"), "\\EFI\\BOOT\\BOOTX64.EFI\n")
    await run("mcopy", ["-i", "esp.img", "startup.nsh", "::"], "Copying startup.nsh...")
    await run("dd", ["if=esp.img", "of=disk.img", `bs=${SECTOR_SIZE}`, `seek=${ESP_START_SECTOR}`, "conv=notrunc"], "Writing ESP...")

    // RedoxFS root
    const stagedRoot = join(workDir, "redoxfs-root")
    await cp(inputs.rootTree, stagedRoot, { recursive: true, verbatimSymlinks: true })
    await copyIfExists(inputs.kernel, join(stagedRoot, "boot", "kernel"))
    await copyIfExists(inputs.initfs, join(stagedRoot, "boot", "initfs"))

    await run("truncate", ["-s", String(geometry.redoxfsSize), "redoxfs.img"], "Allocating RedoxFS...")
    await run("redoxfs-ar", ["--uid", "0", "--gid", "0", "redoxfs.img", "redoxfs-root"], "Archiving root tree into RedoxFS...")
    await run("dd", ["if=redoxfs.img", "of=disk.img", `bs=${SECTOR_SIZE}`, `seek=${geometry.redoxfsStart}`, "conv=notrunc"], "Writing RedoxFS...")

    return join(workDir, "disk.img")
}
