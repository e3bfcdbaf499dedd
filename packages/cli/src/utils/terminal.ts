import type { Readable } from "node:stream";

type TextInput = Readable & { isTTY?: boolean };

export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/**
 * Text given on the command line, or piped on `input` when the argument is
 * absent or "-". An interactive terminal yields no text. A single trailing
 * newline from the pipe is dropped.
 */
export async function readTextArgument(
  value: string | undefined,
  input: TextInput = process.stdin
): Promise<string> {
  if (value !== undefined && value !== "-") {
    return value;
  }
  if (input.isTTY) {
    return "";
  }
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8").replace(/\r?\n$/, "");
}
