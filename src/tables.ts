import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

import { parseDirectoryListing } from "./directory";
import { normalizeRows, type Row } from "./normalize";
import { textContent } from "./utils";

export interface Table {
  index: number;
  id: string;
  name: string;
  rows: Row[];
}

export function loadDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Collects the cell text of every `tr` below `table`, including rows inside
 * row groups and nested tables. Only direct `td`/`th` children of a row count,
 * and rows without any such cell are skipped.
 */
export function extractRows(table: Element, $: CheerioAPI): Row[] {
  const rows: Row[] = [];

  $(table)
    .find("tr")
    .each((_, tr) => {
      const cells = $(tr).children("td, th");
      if (!cells.length) return;
      rows.push(cells.toArray().map((cell) => textContent(cell).trim()));
    });

  return rows;
}

/**
 * Numbers every `table` element in document order, nested ones included.
 * A table left without rows after normalization is dropped but keeps its
 * number, so indexes can have gaps.
 */
export function extractTables($: CheerioAPI): Table[] {
  const tables: Table[] = [];

  $("table").each((position, table) => {
    const rows = normalizeRows(extractRows(table, $));
    if (!rows.length) return;
    const $table = $(table);
    tables.push({
      index: position + 1,
      id: $table.attr("id") ?? "",
      name: $table.attr("name") ?? "",
      rows,
    });
  });

  return tables;
}

export interface ParseResult {
  tables: Table[];
  fromDirectoryListing: boolean;
}

/**
 * Extracts every table of `html`, falling back to a directory-listing
 * `<pre>` block when no `<table>` produced rows.
 */
export function parseTables(html: string): ParseResult {
  const $ = loadDocument(html);
  const tables = extractTables($);
  if (tables.length) {
    return { tables, fromDirectoryListing: false };
  }
  const listing = parseDirectoryListing($.root()[0]);
  return listing
    ? { tables: [listing], fromDirectoryListing: true }
    : { tables: [], fromDirectoryListing: false };
}

/** Drops each table's first row, and tables that have nothing after it. */
export function skipHeader(tables: Table[]): Table[] {
  return tables
    .filter((table) => table.rows.length > 1)
    .map((table) => ({ ...table, rows: table.rows.slice(1) }));
}
