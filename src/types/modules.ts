/***
 *
 *
 *  System Configuration Modules
 *
 *  One zod schema per configuration module. Every option carries its
 *  default, so parsing an empty object yields the complete default system.
 *
 */

import { z } from "zod"

// Map keys used as a single file or directory name in the root tree
const EntryName = z.string()
    .regex(/^[A-Za-z0-9_.-]+$/, "Names may only contain letters, digits, dots, dashes and underscores")
    .refine(name => name !== "." && name !== "..", "Names may not be \".\" or \"..\"")

const noParentSegments = (path: string): boolean => !path.split("/").includes("..")
const PARENT_SEGMENT_MESSAGE = "Paths may not contain \"..\" segments"

const TreePath = z.string().refine(noParentSegments, PARENT_SEGMENT_MESSAGE)
const AbsoluteTreePath = z.string().startsWith("/").refine(noParentSegments, PARENT_SEGMENT_MESSAGE)

// =========================================================================
// BOOT
// =========================================================================

export const BootSchema = z.object({
    kernel: z.string().default("kernel"),
    bootloader: z.string().default("bootloader"),
    initfsExtraBinaries: z.array(z.string()).default([]),
    initfsExtraDrivers: z.array(z.string()).default([]),
    initfsEnableGraphics: z.boolean().default(false),
    diskSizeMB: z.number().int().positive().default(512),
    espSizeMB: z.number().int().positive().default(200),
}).default({})

// =========================================================================
// ENVIRONMENT
// =========================================================================

export const EnvironmentSchema = z.object({
    systemPackages: z.array(z.string()).default([]),
    shellAliases: z.record(z.string()).default({
        ls: "ls --color=auto",
        grep: "grep --color=auto",
    }),
    variables: z.record(z.string()).default({
        PATH: "/bin:/usr/bin",
        HOME: "/root",
        USER: "root",
        SHELL: "/bin/ion",
        TERM: "xterm-256color",
    }),
    shellInit: z.string().default(""),
}).default({})

// =========================================================================
// FILESYSTEM
// =========================================================================

export const FilesystemSchema = z.object({
    extraDirectories: z.array(AbsoluteTreePath).default([
        "/root", "/home", "/tmp", "/var", "/var/log", "/var/tmp", "/etc", "/bin", "/sbin",
        "/usr", "/usr/bin", "/usr/sbin", "/usr/lib", "/usr/share", "/scheme", "/dev",
    ]),
    devSymlinks: z.record(EntryName, z.string()).default({
        urandom: "/scheme/rand",
        random: "/scheme/rand",
        null: "/scheme/null",
        zero: "/scheme/zero",
        full: "/scheme/zero",
    }),
    specialSymlinks: z.record(TreePath, z.string()).default({
        "bin/sh": "/bin/ion",
    }),
}).default({})

// =========================================================================
// GRAPHICS
// =========================================================================

export const GraphicsSchema = z.object({
    enable: z.boolean().default(false),
    resolution: z.string().regex(/^\d+x\d+$/, "Resolution must look like 1024x768").default("1024x768"),
}).default({})

// =========================================================================
// HARDWARE
// =========================================================================

export const StorageDriver = z.enum(["ahcid", "nvmed", "ided", "virtio-blkd"])
export const NetworkDriver = z.enum(["e1000d", "virtio-netd", "rtl8168d"])
export const GraphicsDriver = z.enum(["virtio-gpud", "bgad"])
export const AudioDriver = z.enum(["ihdad", "ac97d", "sb16d"])

export const HardwareSchema = z.object({
    storageDrivers: z.array(StorageDriver).default(["ahcid", "nvmed", "virtio-blkd"]),
    networkDrivers: z.array(NetworkDriver).default(["e1000d", "virtio-netd"]),
    graphicsDrivers: z.array(GraphicsDriver).default(["virtio-gpud", "bgad"]),
    audioEnable: z.boolean().default(false),
    audioDrivers: z.array(AudioDriver).default(["ihdad", "ac97d", "sb16d"]),
    usbEnable: z.boolean().default(false),
}).default({})

// =========================================================================
// LOGGING
// =========================================================================

export const LogLevel = z.enum(["debug", "info", "warn", "error", "off"])

export const LoggingSchema = z.object({
    level: LogLevel.default("info"),
    kernelLogLevel: LogLevel.default("warn"),
    logToFile: z.boolean().default(true),
    logPath: AbsoluteTreePath.default("/var/log"),
    maxLogSizeMB: z.number().int().positive().default(10),
    persistAcrossBoot: z.boolean().default(false),
}).default({})

// =========================================================================
// NETWORKING
// =========================================================================

export const InterfaceSchema = z.object({
    address: z.string().ip({ version: "v4" }),
    netmask: z.string().ip({ version: "v4" }).default("255.255.255.0"),
    gateway: z.string().ip({ version: "v4" }),
})

export const NetworkMode = z.enum(["auto", "dhcp", "static", "none"])

export const NetworkingSchema = z.object({
    enable: z.boolean().default(true),
    mode: NetworkMode.default("auto"),
    dns: z.array(z.string()).default(["1.1.1.1", "8.8.8.8"]),
    defaultRouter: z.string().default("10.0.2.2"),
    interfaces: z.record(EntryName, InterfaceSchema).default({}),
    remoteShellEnable: z.boolean().default(false),
    remoteShellPort: z.number().int().min(1).max(65535).default(8023),
}).default({})

// =========================================================================
// POWER
// =========================================================================

export const PowerSchema = z.object({
    acpiEnable: z.boolean().default(true),
    powerAction: z.enum(["shutdown", "reboot", "suspend", "none"]).default("shutdown"),
    idleAction: z.enum(["none", "suspend", "shutdown"]).default("none"),
    idleTimeoutMinutes: z.number().int().nonnegative().default(30),
    rebootOnPanic: z.boolean().default(false),
}).default({})

// =========================================================================
// PROGRAMS
// =========================================================================

export const ProgramsSchema = z.object({
    ion: z.object({
        enable: z.boolean().default(true),
        initExtra: z.string().default(""),
    }).default({}),
    helix: z.object({
        enable: z.boolean().default(false),
        theme: z.string().default("default"),
    }).default({}),
    editor: z.string().default("/bin/sodium"),
    httpd: z.object({
        enable: z.boolean().default(false),
        port: z.number().int().min(1).max(65535).default(8080),
        rootDir: z.string().startsWith("/").default("/var/www"),
    }).default({}),
}).default({})

// =========================================================================
// SECURITY
// =========================================================================

export const NamespaceAccess = z.enum(["full", "read-only", "none"])

export const SecuritySchema = z.object({
    namespaceAccess: z.record(NamespaceAccess).default({
        file: "full",
        net: "full",
        log: "read-only",
        sys: "read-only",
        display: "none",
    }),
    setuidPrograms: z.array(z.string()).default(["su", "sudo", "login", "passwd"]),
    protectKernelSchemes: z.boolean().default(true),
    requirePasswords: z.boolean().default(false),
    allowRemoteRoot: z.boolean().default(false),
}).default({})

// =========================================================================
// SERVICES
// =========================================================================

export const InitScriptSchema = z.object({
    text: z.string(),
    directory: TreePath.default("init.d"),
})

export const ServiceType = z.enum(["oneshot", "daemon", "nowait", "scheme"])

export const ServiceSchema = z.object({
    description: z.string().default(""),
    command: z.string().min(1),
    type: ServiceType.default("daemon"),
    args: z.array(z.string()).default([]),
    wantedBy: z.enum(["initfs", "rootfs"]).default("rootfs"),
    enable: z.boolean().default(true),
    // Scheme name registered by `scheme` services, defaults to the service name
    scheme: z.string().optional(),
})

export const DEFAULT_STARTUP_SCRIPT = [
    "export PATH /bin:/usr/bin",
    "export HOME /root",
    "export USER root",
    "export SHELL /bin/ion",
    "export TERM xterm-256color",
    "export XDG_CONFIG_HOME /etc",
    "echo \"\"",
    "echo \"==========================================\"",
    "echo \"  Redox OS Boot Complete!\"",
    "echo \"==========================================\"",
    "echo \"\"",
    "echo \"Starting interactive shell...\"",
    "echo \"Type 'help' for commands, 'exit' to quit\"",
    "echo \"\"",
    "/bin/ion",
    "",
].join("\n")

export const ServicesSchema = z.object({
    initScripts: z.record(EntryName, InitScriptSchema).default({
        "00_base": { text: "notify /bin/ipcd", directory: "usr/lib/init.d" },
    }),
    services: z.record(EntryName, ServiceSchema).default({}),
    startupScriptEnable: z.boolean().default(true),
    startupScriptText: z.string().default(DEFAULT_STARTUP_SCRIPT),
}).default({})

// =========================================================================
// TIME
// =========================================================================

export const TimeSchema = z.object({
    hostname: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9-]*$/, "Hostname may only contain letters, digits and dashes").default("redox"),
    timezone: z.string().default("UTC"),
    ntpEnable: z.boolean().default(false),
    ntpServers: z.array(z.string()).default(["pool.ntp.org"]),
    hwclock: z.enum(["utc", "localtime"]).default("utc"),
}).default({})

// =========================================================================
// USERS
// =========================================================================

export const UserSchema = z.object({
    uid: z.number().int().nonnegative(),
    gid: z.number().int().nonnegative(),
    // Defaults to /home/<name> when omitted
    home: AbsoluteTreePath.optional(),
    shell: z.string().default("/bin/ion"),
    password: z.string().default(""),
    // Defaults to the user name when omitted
    realname: z.string().optional(),
    createHome: z.boolean().default(true),
})

export const GroupSchema = z.object({
    gid: z.number().int().nonnegative(),
    members: z.array(z.string()).default([]),
})

export const UsersSchema = z.object({
    users: z.record(EntryName, UserSchema).default({
        root: { uid: 0, gid: 0, home: "/root", shell: "/bin/ion", password: "", realname: "root", createHome: true },
        user: { uid: 1000, gid: 1000, home: "/home/user", shell: "/bin/ion", password: "", realname: "Default User", createHome: true },
    }),
    groups: z.record(EntryName, GroupSchema).default({
        root: { gid: 0, members: [] },
        user: { gid: 1000, members: ["user"] },
    }),
}).default({})

// =========================================================================
// VIRTUALISATION
// =========================================================================

export const VmmKind = z.enum(["cloud-hypervisor", "qemu"])

export const VirtualisationSchema = z.object({
    vmm: VmmKind.default("cloud-hypervisor"),
    memorySize: z.number().int().positive().default(2048),
    cpus: z.number().int().positive().default(4),
    graphics: z.boolean().default(false),
    serialConsole: z.boolean().default(true),
    useCoW: z.boolean().default(true),
    hugepages: z.boolean().default(false),
    directIO: z.boolean().default(true),
    apiSocket: z.boolean().default(false),
    tapNetworking: z.boolean().default(false),
    qemuExtraArgs: z.array(z.string()).default([]),
}).default({})

// =========================================================================
// SYSTEM
// =========================================================================

export const SystemConfigSchema = z.object({
    boot: BootSchema,
    environment: EnvironmentSchema,
    filesystem: FilesystemSchema,
    graphics: GraphicsSchema,
    hardware: HardwareSchema,
    logging: LoggingSchema,
    networking: NetworkingSchema,
    power: PowerSchema,
    programs: ProgramsSchema,
    security: SecuritySchema,
    services: ServicesSchema,
    time: TimeSchema,
    users: UsersSchema,
    virtualisation: VirtualisationSchema,
}).strict()

export type SystemConfig = z.infer<typeof SystemConfigSchema>
export type SystemConfigInput = z.input<typeof SystemConfigSchema>
export type ModuleName = keyof SystemConfig

export type User = z.infer<typeof UserSchema>
export type Group = z.infer<typeof GroupSchema>
export type Interface = z.infer<typeof InterfaceSchema>
export type InitScript = z.infer<typeof InitScriptSchema>
export type Service = z.infer<typeof ServiceSchema>
export type NetworkModeType = z.infer<typeof NetworkMode>
export type VmmKindType = z.infer<typeof VmmKind>
