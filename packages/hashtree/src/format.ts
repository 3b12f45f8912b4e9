import { bytesToHex } from "@noble/hashes/utils";
import { assertDepth, unreachableNode } from "./hashtree.js";
import type { HashTree } from "./hashtree.js";
import { formatLabel, isPrintableAscii } from "./label.js";

function formatValue(value: Uint8Array): string {
  if (value.length > 0 && isPrintableAscii(value)) {
    return `"${new TextDecoder().decode(value)}"`;
  }
  return `0x${bytesToHex(value)}`;
}

/**
 * Renders a tree as indented text, one node per line, for logs and test
 * failure output. Values and labels print as text when printable ASCII.
 *
 *   fork
 *     labeled time
 *       leaf "12345"
 *     pruned 0x1f2e...
 */
export function formatHashTree(tree: HashTree): string {
  const lines: string[] = [];
  formatNode(tree, 0, lines);
  return lines.join("\n");
}

function formatNode(tree: HashTree, depth: number, lines: string[]): void {
  assertDepth(depth);
  const indent = "  ".repeat(depth);

  switch (tree.kind) {
    case "empty":
      lines.push(`${indent}empty`);
      return;
    case "fork":
      lines.push(`${indent}fork`);
      formatNode(tree.left, depth + 1, lines);
      formatNode(tree.right, depth + 1, lines);
      return;
    case "labeled":
      lines.push(`${indent}labeled ${formatLabel(tree.label)}`);
      formatNode(tree.subtree, depth + 1, lines);
      return;
    case "leaf":
      lines.push(`${indent}leaf ${formatValue(tree.value)}`);
      return;
    case "pruned":
      lines.push(`${indent}pruned 0x${bytesToHex(tree.digest)}`);
      return;
    default:
      unreachableNode(tree);
  }
}
