import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";

/**
 * Concatenates the data of every text node under `node`, in document order.
 * Nothing is inserted between fragments and nothing is trimmed.
 */
export const textContent = (node: AnyNode): string => {
  if (isText(node)) {
    return node.data;
  }
  if (!hasChildren(node)) {
    return "";
  }
  let text = "";
  for (const child of node.children) {
    text += textContent(child);
  }
  return text;
};

export const isElement = (
  node: AnyNode | null | undefined,
  tagName: string
): node is Element => Boolean(node && isTag(node) && node.name === tagName);

/**
 * Returns the first element named `tagName` in document order, or undefined.
 */
export const firstElement = (
  root: AnyNode,
  tagName: string
): Element | undefined => {
  if (isElement(root, tagName)) {
    return root;
  }
  if (!hasChildren(root)) {
    return undefined;
  }
  for (const child of root.children) {
    const found = firstElement(child, tagName);
    if (found) {
      return found;
    }
  }
  return undefined;
};
