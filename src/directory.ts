import { isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";

import { padRow, type Row } from "./normalize";
import type { Table } from "./tables";
import { firstElement, isElement, textContent } from "./utils";

export const DIRECTORY_TABLE_NAME = "directory";

/**
 * Builds a table out of a web server's plain directory index:
 *
 * ```html
 * <pre><a href="?C=N;O=D">Name</a> <a href="?C=M;O=A">Last modified</a> ...<hr>
 * <a href="file.iso">file.iso</a>   2025-08-25 20:08  3.3G
 * </pre>
 * ```
 *
 * Anchors before the `<hr>` are column labels; each anchor after it starts a
 * row, completed from the text that follows it (date, time, size). Only the
 * first `<pre>` of the document is considered.
 */
export function parseDirectoryListing(root: AnyNode): Table | undefined {
  const pre = firstElement(root, "pre");
  if (!pre) {
    return undefined;
  }

  const header: string[] = [];
  const rows: Row[] = [];
  let inHeader = true;

  for (const node of pre.children) {
    if (isElement(node, "hr")) {
      inHeader = false;
      continue;
    }
    if (!isElement(node, "a")) {
      continue;
    }

    const label = textContent(node).trim();
    if (inHeader) {
      header.push(label);
      continue;
    }

    const { next }: Element = node;
    const fields = next && isText(next) ? next.data.trim().split(/\s+/) : [];
    const row = [label];
    if (fields.length >= 2) {
      row.push(`${fields[0]} ${fields[1]}`);
    }
    if (fields.length >= 3) {
      row.push(fields[2]);
    }
    rows.push(row);
  }

  if (!header.length || !rows.length) {
    return undefined;
  }

  return {
    index: 1,
    id: "",
    name: DIRECTORY_TABLE_NAME,
    rows: [header, ...rows.map((row) => padRow(row, header.length))],
  };
}
