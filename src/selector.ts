import type { Table } from "./tables";

export interface Selector {
  indexes: Set<number>;
  names: Set<string>;
}

export class SelectorError extends Error {
  override name = "SelectorError";
}

const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * Parses a comma-separated list of table indexes (1-based) and ids/names,
 * e.g. `"1, 3, prices"`. Blank input selects everything.
 */
export function parseSelector(input: string): Selector {
  const selector: Selector = { indexes: new Set(), names: new Set() };

  for (const part of input.split(",")) {
    const value = part.trim();
    if (!value) {
      continue;
    }
    const index = INTEGER_REGEX.test(value)
      ? Number.parseInt(value, 10)
      : Number.NaN;
    if (Number.isSafeInteger(index)) {
      if (index <= 0) {
        throw new SelectorError("table index must be >= 1");
      }
      selector.indexes.add(index);
    } else {
      selector.names.add(value);
    }
  }

  return selector;
}

export const isEmptySelector = (selector: Selector): boolean =>
  selector.indexes.size === 0 && selector.names.size === 0;

export function applySelector(tables: Table[], selector: Selector): Table[] {
  if (isEmptySelector(selector)) {
    return tables;
  }
  return tables.filter(
    (table) =>
      selector.indexes.has(table.index) ||
      (table.id !== "" && selector.names.has(table.id)) ||
      (table.name !== "" && selector.names.has(table.name))
  );
}
