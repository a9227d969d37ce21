import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Default bound for long-running encodes: 10 minutes */
export const DEFAULT_EXEC_TIMEOUT_MS = 10 * 60 * 1000;

export interface ExecResult {
  stdout: string;
  stderr: string;
}

/** Non-zero exit, spawn failure, or timeout of an external command */
export class ExecError extends Error {
  readonly cmd: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(
    cmd: string,
    message: string,
    fields: { exitCode: number | null; stdout: string; stderr: string; timedOut: boolean }
  ) {
    super(message);
    this.name = "ExecError";
    this.cmd = cmd;
    this.exitCode = fields.exitCode;
    this.stdout = fields.stdout;
    this.stderr = fields.stderr;
    this.timedOut = fields.timedOut;
  }
}

/** Safe async exec: no shell, args as array */
export async function execSafe(
  cmd: string,
  args: string[],
  options?: { timeout?: number; maxBuffer?: number },
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(cmd, args, {
      timeout: options?.timeout ?? DEFAULT_EXEC_TIMEOUT_MS,
      maxBuffer: options?.maxBuffer ?? 50 * 1024 * 1024,
      encoding: "utf-8",
    });
    return { stdout, stderr };
  } catch (error) {
    throw toExecError(cmd, error);
  }
}

function toExecError(cmd: string, error: unknown): ExecError {
  if (!(error instanceof Error)) {
    return new ExecError(cmd, String(error), { exitCode: null, stdout: "", stderr: "", timedOut: false });
  }

  const code = readField(error, "code");
  const stdout = readField(error, "stdout");
  const stderr = readField(error, "stderr");
  const timedOut = readField(error, "killed") === true;

  return new ExecError(cmd, timedOut ? `${cmd} timed out` : error.message, {
    exitCode: typeof code === "number" ? code : null,
    stdout: typeof stdout === "string" ? stdout : "",
    stderr: typeof stderr === "string" ? stderr : "",
    timedOut,
  });
}

function readField(error: Error, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}
