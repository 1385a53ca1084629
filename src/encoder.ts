import type { Writable } from "node:stream";

import type { Table } from "./tables";

export const DEFAULT_DELIMITER = ",";
export const TSV_DELIMITER = "\t";

export class EncoderError extends Error {
  override name = "EncoderError";
}

/**
 * A failed write reports through the callback and then through an "error"
 * event, so the listener is only removed after a successful write.
 */
const writeChunk = (out: Writable, chunk: string): Promise<void> =>
  new Promise((resolve, reject) => {
    out.once("error", reject);
    out.write(chunk, (error) => {
      if (error) {
        reject(error);
        return;
      }
      out.off("error", reject);
      resolve();
    });
  });

/**
 * Writes tables as delimiter-separated records, one record per row and an
 * empty record after every table.
 */
export class TableEncoder {
  readonly delimiter: string;

  constructor(delimiter = DEFAULT_DELIMITER) {
    if ([...delimiter].length !== 1) {
      throw new EncoderError("delimiter must be a single character");
    }
    if (delimiter === '"' || delimiter === "\r" || delimiter === "\n") {
      throw new EncoderError(`invalid delimiter ${JSON.stringify(delimiter)}`);
    }
    this.delimiter = delimiter;
  }

  private needsQuotes(field: string): boolean {
    if (field === "") {
      return false;
    }
    if (field === "\\.") {
      return true;
    }
    return (
      field.includes(this.delimiter) ||
      /["\r\n]/.test(field) ||
      /^\s/u.test(field)
    );
  }

  formatRecord(fields: string[]): string {
    const encoded = fields.map((field) =>
      this.needsQuotes(field) ? `"${field.replaceAll('"', '""')}"` : field
    );
    return `${encoded.join(this.delimiter)}\n`;
  }

  async encode(out: Writable, tables: Table[]): Promise<void> {
    for (const table of tables) {
      for (const row of table.rows) {
        await writeChunk(out, this.formatRecord(row));
      }
      await writeChunk(out, this.formatRecord([]));
    }
  }
}
