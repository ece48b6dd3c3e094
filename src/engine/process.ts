import { spawn } from "node:child_process";

export type ProcessOutput = { code: number; stdout: Buffer; stderr: string };

export type RunOptions = { input?: string | Buffer; signal?: AbortSignal };

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options?: RunOptions,
) => Promise<ProcessOutput>;

/**
 * Runs a command to completion, feeding `input` on stdin and collecting
 * stdout as bytes. Spawn failures (ENOENT, abort) reject; a non-zero exit
 * resolves with its code so callers can report stderr.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise<ProcessOutput>((resolve, reject) => {
    const proc = spawn(command, [...args], { windowsHide: true, signal: options.signal });
    const chunks: Buffer[] = [];
    let err = "";

    proc.stdout.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      err += chunk.toString();
    });
    proc.stdin.on("error", (error) => reject(error));
    proc.on("error", (error) => reject(error));
    proc.on("close", (exitCode) =>
      resolve({ code: exitCode ?? 1, stdout: Buffer.concat(chunks), stderr: err }),
    );

    proc.stdin.end(options.input);
  });
