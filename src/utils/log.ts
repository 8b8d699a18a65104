/***
 *
 *
 *  Logging Utilities
 *
 */

import { Settings } from "../settings"
import chalk, { type ChalkInstance } from "chalk"
import ora, { type Ora } from "ora"

type Level = "log" | "info" | "success" | "warning" | "error" | "debug" | "cached"

interface LevelStyle {
    icon: string
    color: ChalkInstance
    body?: (message: string) => string
    stream?: "stdout" | "stderr"
}

const LEVELS: Record<Level, LevelStyle> = {
    log: { icon: "›", color: chalk.cyan },
    info: { icon: "•", color: chalk.blue },
    success: { icon: "✓", color: chalk.green, body: chalk.green },
    warning: { icon: "⚠", color: chalk.yellow, body: chalk.yellow },
    error: { icon: "✗", color: chalk.red, body: chalk.red, stream: "stderr" },
    debug: { icon: "○", color: chalk.yellow, body: chalk.dim },
    cached: { icon: "◆", color: chalk.magenta, body: message => `${message} ${chalk.dim("(cached)")}` },
}

const PENDING_ICON = "·"

// Indent for captured output, lines up under the text after "redox ›"
const RAW_INDENT = " ".repeat(7)

export class Logger {

    static prefix = chalk.bold.cyan("redox")

    public static format(level: Level, message: string): string {
        const style = LEVELS[level]
        const body = style.body ? style.body(message) : message
        return `${Logger.prefix} ${style.color(style.icon)} ${body}`
    }

    private static emit(level: Level, message: string): void {
        const line = Logger.format(level, message)
        if (LEVELS[level].stream === "stderr") {
            console.error(line)
        } else {
            console.log(line)
        }
    }

    public static log(message: string) { Logger.emit("log", message) }
    public static info(message: string) { Logger.emit("info", message) }
    public static success(message: string) { Logger.emit("success", message) }
    public static warning(message: string) { Logger.emit("warning", message) }
    public static error(message: string) { Logger.emit("error", message) }
    public static cached(message: string) { Logger.emit("cached", message) }

    public static debug(message: string) {
        if (!Settings.verbose) return
        Logger.emit("debug", message)
    }

    public static errorWithExit(message: string): never {
        Logger.emit("error", message)
        process.exit(1)
    }

    public static title(text: string): void {
        const rule = "─".repeat(Math.min(text.length + 4, 60))
        console.log(`\n${chalk.bold.cyan(text)}\n${chalk.dim(rule)}`)
    }

    public static blank(): void {
        console.log()
    }

    // Timeline entry, e.g. "✓ [3.120s] Kernel running"
    public static milestone(elapsed: string, message: string, reached = true): void {
        const marker = reached ? chalk.green(LEVELS.success.icon) : chalk.dim(PENDING_ICON)
        console.log(`  ${marker} ${chalk.dim(`[${elapsed}]`)} ${message}`)
    }

    // No badge, for tables and reports meant to be piped
    public static plain(message = ""): void {
        console.log(message)
    }

    public static raw(output: string): void {
        output
            .split("\n")
            .filter(line => line.trim() !== "")
            .forEach(line => console.log(RAW_INDENT + chalk.dim(line)))
    }
}

export class Spinner {

    private handle: Ora | null = null

    constructor(private message: string) {}

    start(): void {
        const frames = ["◐", "◓", "◑", "◒"].map(frame => `${Logger.prefix} ${chalk.cyan(frame)}`)
        this.handle = ora({ text: this.message, spinner: { interval: 80, frames } }).start()
    }

    stop(): void {
        this.handle?.stop()
        this.handle = null
    }

    stopWithSuccess(message: string): void {
        this.stop()
        Logger.success(message)
    }

    updateMessage(message: string): void {
        this.message = message
        if (this.handle) this.handle.text = message
    }
}
