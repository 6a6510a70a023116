/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";

/**
 * Streams a command talks to; tests pass their own
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Read all of stdin, failing past maxBytes */
  readStdin(maxBytes: number): Promise<string>;
  isStdinTTY(): boolean;
  /** Emit ANSI colors on stderr */
  colors: boolean;
  env: NodeJS.ProcessEnv;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/**
 * Read from stdin with size limit
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${formatMegabytes(maxBytes)})`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read a feed file as bytes, with a leading byte order mark removed
 * @throws CliError when the file is missing or larger than maxBytes
 */
export async function readFeedFile(filePath: string, maxBytes: number): Promise<Uint8Array> {
  let size: number;
  try {
    size = (await fs.stat(filePath)).size;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new CliError(`File not found: ${filePath}`, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Cannot read ${filePath}: ${reason}`, { cause: err });
  }

  if (size > maxBytes) {
    throw new CliError(`${filePath} is too large (max ${formatMegabytes(maxBytes)})`);
  }

  return stripBom(new Uint8Array(await fs.readFile(filePath)));
}

/**
 * Feed text from stdin
 * @throws CliError when stdin is a terminal, too large, or empty
 */
export async function readFeedStdin(io: CliIO, maxBytes: number): Promise<string> {
  if (io.isStdinTTY()) {
    throw new CliError("No input provided. Pass a feed file or pipe JSON to stdin");
  }

  let text: string;
  try {
    text = await io.readStdin(maxBytes);
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", {
      cause: err,
    });
  }

  if (!text.trim()) {
    throw new CliError("stdin is empty");
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * IO bound to the running process
 */
export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    readStdin,
    isStdinTTY: () => process.stdin.isTTY ?? false,
    colors: process.stderr.isTTY ?? false,
    env: process.env,
  };
}

function stripBom(bytes: Uint8Array): Uint8Array {
  const hasBom = UTF8_BOM.every((byte, i) => bytes[i] === byte);
  return hasBom ? bytes.subarray(UTF8_BOM.length) : bytes;
}

function formatMegabytes(bytes: number): string {
  return `${Math.floor(bytes / (1024 * 1024))}MB`;
}
