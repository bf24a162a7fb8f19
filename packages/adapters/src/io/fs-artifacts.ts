import { promises as fsp } from "node:fs";
import path from "node:path";
import { CliError, CLI_ERROR_CODES, errorMessage } from "@qprof/cli-core";

export type PathKind = "file" | "directory" | "missing";

function ioError(
  code: typeof CLI_ERROR_CODES.E_IO_READ | typeof CLI_ERROR_CODES.E_IO_WRITE,
  action: string,
  target: string,
  error: unknown,
): CliError {
  return new CliError(code, `Failed to ${action} ${target}: ${errorMessage(error)}`, {
    path: target,
  });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function ensureDir(dir: string): Promise<void> {
  try {
    await fsp.mkdir(dir, { recursive: true });
  } catch (error) {
    throw ioError(CLI_ERROR_CODES.E_IO_WRITE, "create directory", dir, error);
  }
}

export async function writeText(file: string, text: string): Promise<void> {
  await ensureDir(path.dirname(file));
  try {
    await fsp.writeFile(file, text, "utf8");
  } catch (error) {
    throw ioError(CLI_ERROR_CODES.E_IO_WRITE, "write", file, error);
  }
}

export async function appendText(file: string, text: string): Promise<void> {
  await ensureDir(path.dirname(file));
  try {
    await fsp.appendFile(file, text, "utf8");
  } catch (error) {
    throw ioError(CLI_ERROR_CODES.E_IO_WRITE, "append to", file, error);
  }
}

export async function readText(file: string): Promise<string> {
  try {
    return await fsp.readFile(file, "utf8");
  } catch (error) {
    throw ioError(CLI_ERROR_CODES.E_IO_READ, "read", file, error);
  }
}

/** Create an empty file, or bump its mtime when it exists. */
export async function touch(file: string): Promise<void> {
  await ensureDir(path.dirname(file));
  const now = new Date();
  try {
    await fsp.utimes(file, now, now);
  } catch (error) {
    if (!isNotFound(error)) {
      throw ioError(CLI_ERROR_CODES.E_IO_WRITE, "touch", file, error);
    }
    await writeText(file, "");
  }
}

/** Remove a file; a file that is already gone is not an error. */
export async function removeFile(file: string): Promise<void> {
  try {
    await fsp.rm(file, { force: true });
  } catch (error) {
    throw ioError(CLI_ERROR_CODES.E_IO_WRITE, "remove", file, error);
  }
}

/** Names of the regular files directly inside `dir`, sorted; a missing dir yields []. */
export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fsp.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw ioError(CLI_ERROR_CODES.E_IO_READ, "list", dir, error);
  }
}

export async function pathKind(target: string): Promise<PathKind> {
  try {
    const stat = await fsp.stat(target);
    if (stat.isDirectory()) return "directory";
    return stat.isFile() ? "file" : "missing";
  } catch (error) {
    if (isNotFound(error) || (error instanceof Error && "code" in error && error.code === "ENAMETOOLONG")) {
      return "missing";
    }
    throw ioError(CLI_ERROR_CODES.E_IO_READ, "inspect", target, error);
  }
}
