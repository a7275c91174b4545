// =============================================================================
// CLI Format — ANSI color helpers and tree printing (zero dependencies)
// =============================================================================

import type { ResolvedNode } from "../types.js";

const CODES = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

export type ColorName = Exclude<keyof typeof CODES, "reset">;

export interface Formatter {
  color(name: ColorName, text: string): string;
  bold(text: string): string;
}

export function createFormatter(enabled: boolean): Formatter {
  return {
    color(name, text) {
      return enabled ? `${CODES[name]}${text}${CODES.reset}` : text;
    },
    bold(text) {
      return enabled ? `${CODES.bold}${text}${CODES.reset}` : text;
    },
  };
}

function describeNode(node: ResolvedNode, fmt: Formatter): string {
  const label = `${fmt.bold(node.kind)}${fmt.color("gray", `#${node.id}`)}`;
  return Object.keys(node.properties).length > 0
    ? `${label} ${JSON.stringify(node.properties)}`
    : label;
}

/** One line per node, children drawn with box characters. */
export function formatTree(root: ResolvedNode, fmt: Formatter = createFormatter(false)): string {
  const lines: string[] = [describeNode(root, fmt)];

  function walk(node: ResolvedNode, prefix: string): void {
    node.children.forEach((child, index) => {
      const last = index === node.children.length - 1;
      lines.push(`${prefix}${last ? "└─ " : "├─ "}${describeNode(child, fmt)}`);
      walk(child, `${prefix}${last ? "   " : "│  "}`);
    });
  }

  walk(root, "");
  return lines.join("\n");
}
