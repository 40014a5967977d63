/**
 * In-process CLI runner for tests
 */

import { vi } from "vitest";
import { run } from "../src/program.js";

export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run the program with `args`, capturing console and stream output
 */
export async function runCli(args: string[]): Promise<CliResult> {
  const out: string[] = [];
  const errors: string[] = [];

  const spies = [
    vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
      out.push(parts.map(String).join(" ") + "\n");
    }),
    vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
      errors.push(parts.map(String).join(" ") + "\n");
    }),
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      out.push(String(chunk));
      return true;
    }),
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      errors.push(String(chunk));
      return true;
    }),
  ];

  try {
    const exitCode = await run(["node", "tabledb", ...args]);
    return { stdout: out.join(""), stderr: errors.join(""), exitCode };
  } finally {
    for (const spy of spies) {
      spy.mockRestore();
    }
  }
}

/**
 * Run `fn` with stdin reporting a non-interactive terminal
 */
export async function withoutTTY<T>(fn: () => Promise<T>): Promise<T> {
  const wasTTY = process.stdin.isTTY;
  process.stdin.isTTY = false;
  try {
    return await fn();
  } finally {
    process.stdin.isTTY = wasTTY;
  }
}
