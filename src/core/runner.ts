import { execa } from "execa";

export type RunOptions = {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  reject?: boolean;
};

export type RunResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandRunner = (file: string, args: readonly string[], options?: RunOptions) => Promise<RunResult>;

export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  const result = await execa(file, [...args], {
    cwd: options.cwd,
    env: options.env,
    input: options.input,
    reject: options.reject ?? true,
    stripFinalNewline: true,
  });

  return {
    stdout: typeof result.stdout === "string" ? result.stdout : "",
    stderr: typeof result.stderr === "string" ? result.stderr : "",
    exitCode: result.exitCode ?? 0,
  };
};

export function commandErrorText(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const parts: string[] = [];
  if (error.message.trim()) parts.push(error.message);
  for (const key of ["shortMessage", "stderr", "stdout"] as const) {
    const value: unknown = key in error ? Reflect.get(error, key) : undefined;
    if (typeof value === "string" && value.trim()) parts.push(value);
  }
  return parts.join("\n");
}
