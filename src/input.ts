import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/** Reads the whole document from `file`, or from `stdin` when no file is given. */
export function readInput(
  file: string | undefined,
  stdin?: Readable
): Promise<string> {
  if (file !== undefined) {
    return readFile(file, "utf8");
  }
  return readStream(stdin ?? process.stdin);
}
