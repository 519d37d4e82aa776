import { promises as fs } from "node:fs";
import * as path from "node:path";

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function withPathMessage(error: unknown, message: string): Error {
  if (error instanceof Error) {
    error.message = `${message}: ${error.message}`;
    return error;
  }
  return new Error(`${message}: ${String(error)}`);
}

export async function readTextFile(filePath: string, encoding: BufferEncoding = "utf8"): Promise<string> {
  try {
    return await fs.readFile(filePath, encoding);
  } catch (error) {
    throw withPathMessage(error, `Failed to read text file '${filePath}'`);
  }
}

export async function readJsonFile(filePath: string, encoding: BufferEncoding = "utf8"): Promise<unknown> {
  const rawString = await readTextFile(filePath, encoding);
  try {
    const parsed: unknown = JSON.parse(rawString);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file '${filePath}': ${error.message}`);
    }
    throw error;
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf8");
  } catch (error) {
    throw withPathMessage(error, `Failed to write file '${filePath}'`);
  }
}

export async function createDirectory(directory: string): Promise<string | undefined> {
  try {
    return await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    // Ignore if directory already exists
    if (errorCode(error) === "EEXIST") {
      return undefined;
    }
    throw withPathMessage(error, `Failed to create directory '${directory}'`);
  }
}

/**
 * Points `linkPath` at `target`, replacing a stale link left by a previous generation
 */
export async function replaceSymlink(target: string, linkPath: string): Promise<void> {
  await createDirectory(path.dirname(linkPath));
  try {
    await fs.rm(linkPath, { force: true });
    await fs.symlink(target, linkPath);
  } catch (error) {
    throw withPathMessage(error, `Failed to link '${linkPath}' to '${target}'`);
  }
}
