/**
 * External command execution for local client configuration.
 *
 * @module
 */

import { spawn } from "node:child_process";

/** Outcome of a finished command. */
export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/** Options for a single command run. */
export interface RunCommandOptions {
    /** Written to the command's stdin, which is then closed. */
    input?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Runs a command to completion. Resolves with the exit code and output,
 * whatever the exit code; rejects only when the command cannot be started
 * (e.g. `ENOENT` for a missing binary).
 */
export type CommandRunner = (command: string, args: readonly string[], options?: RunCommandOptions) => Promise<CommandResult>;

/**
 * Default {@link CommandRunner} backed by `child_process.spawn`. No shell is
 * involved, so arguments are passed verbatim.
 */
export const runCommand: CommandRunner = (command, args, options) =>
    new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, [...args], {
            env: options?.env ?? process.env,
            stdio: ["pipe", "pipe", "pipe"],
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        child.once("error", reject);
        child.once("close", (code, signal) => {
            resolve({
                exitCode: code ?? (signal ? 128 : 1),
                stdout: Buffer.concat(stdout).toString("utf-8"),
                stderr: Buffer.concat(stderr).toString("utf-8"),
            });
        });

        // A child that exits before reading stdin raises EPIPE here; the exit
        // status reported through "close" is what counts.
        child.stdin.on("error", (err: NodeJS.ErrnoException) => {
            if (err.code !== "EPIPE") reject(err);
        });
        child.stdin.end(options?.input ?? "");
    });
