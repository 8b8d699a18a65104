/***
 *
 *
 *  Running Utilities
 *
 */

import { spawn } from "child_process"
import { Spinner, Logger } from "./log"
import { Settings } from "../settings"

const PROGRESS_MARKER = "REDOX_PROGRESS:"

export interface RunnerOptions {
    message: string
    messageOnSuccess?: string
    messageOnError?: string
    cwd?: string
    env?: Record<string, string>
    // Return the failed result instead of throwing
    allowFailure?: boolean
    // No spinner or success line, used for probes and bulk copies
    quiet?: boolean
}

export interface CommandResult {
    exitCode: number
    stdout: string
    stderr: string
}

export interface CommandRunner {
    runCommand(command: string, args: string[], options: RunnerOptions): Promise<CommandResult>
}

export class CommandError extends Error {
    constructor(
        public readonly command: string,
        public readonly exitCode: number,
        public readonly stderr: string,
    ) {
        super(`${command} exited with code ${exitCode}`)
        this.name = "CommandError"
    }
}

export class RunnerClass implements CommandRunner {

    public async runCommand(command: string, args: string[], options: RunnerOptions): Promise<CommandResult> {
        const spinner = new Spinner(options.message)
        const useSpinner = !Settings.verbose && !options.quiet
        if (useSpinner) {
            spinner.start()
        } else if (!options.quiet) {
            Logger.log(options.message)
        }

        Logger.debug(`$ ${[command, ...args].join(" ")}`)

        let stdout = ""
        let stderr = ""

        const exitCode = await new Promise<number>((resolve, reject) => {
            const proc = spawn(command, args, {
                cwd: options.cwd ?? Settings.projectPath,
                env: { ...process.env, ...options.env },
                stdio: ["ignore", "pipe", "pipe"],
            })

            proc.stdout.on("data", (chunk: Buffer) => {
                const text = chunk.toString()
                stdout += text
                if (Settings.verbose) {
                    process.stdout.write(text)
                }
                for (const line of text.split("\n")) {
                    const idx = line.indexOf(PROGRESS_MARKER)
                    if (idx >= 0 && useSpinner) {
                        const msg = line.substring(idx + PROGRESS_MARKER.length).trim()
                        if (msg) spinner.updateMessage(msg)
                    }
                }
            })

            proc.stderr.on("data", (chunk: Buffer) => {
                const text = chunk.toString()
                stderr += text
                if (Settings.verbose) {
                    process.stderr.write(text)
                }
            })

            proc.on("error", (err) => {
                spinner.stop()
                reject(err)
            })

            proc.on("close", (code) => resolve(code ?? 1))
        })

        if (exitCode === 0) {
            const successMessage = options.messageOnSuccess ?? options.message
            if (useSpinner) {
                spinner.stopWithSuccess(successMessage)
            } else if (!options.quiet) {
                Logger.success(successMessage)
            }
            return { exitCode, stdout, stderr }
        }

        spinner.stop()
        if (options.allowFailure) {
            return { exitCode, stdout, stderr }
        }

        Logger.error(options.messageOnError ?? `Command failed with exit code ${exitCode}`)
        if (stderr.trim()) {
            Logger.raw(stderr)
        }
        const filteredStdout = stdout
            .split("\n")
            .filter(line => !line.includes(PROGRESS_MARKER))
            .join("\n")
        if (filteredStdout.trim()) {
            Logger.raw(filteredStdout)
        }

        throw new CommandError(command, exitCode, stderr)
    }

}

export const Runner = new RunnerClass()
