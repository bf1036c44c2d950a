import { spawn } from "node:child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunCommandOptions {
  input?: string;
  /** Resolve with the result instead of throwing on a non-zero exit. */
  allowFailure?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export class PlatformCommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || (exitCode === null ? "failed to start" : `exit ${exitCode}`);
    super(`${command}: ${detail}`, cause === undefined ? undefined : { cause });
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.name = "PlatformCommandError";
  }
}

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (error) => {
      reject(new PlatformCommandError(command, null, "", error));
    });
    child.on("close", (code) => {
      const result: CommandResult = {
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        exitCode: code ?? -1,
      };
      if (result.exitCode !== 0 && !options.allowFailure) {
        reject(new PlatformCommandError(command, result.exitCode, result.stderr));
        return;
      }
      resolve(result);
    });

    child.stdin.end(options.input ?? "");
  });
