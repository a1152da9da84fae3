// src/outcome/preview.ts
// Short printable form of call arguments for error messages and ledger events

import { inspect } from "util";

export function previewValue(value: unknown, depth = 2): string {
  return inspect(value, { depth, breakLength: Infinity, maxArrayLength: 10, maxStringLength: 80 });
}

export function previewArgs(
  args: readonly unknown[],
  kwargs: Readonly<Record<string, unknown>> = {},
  depth = 2
): string {
  const parts = args.map(a => previewValue(a, depth));
  for (const [name, value] of Object.entries(kwargs)) {
    parts.push(`${name}=${previewValue(value, depth)}`);
  }
  return `(${parts.join(", ")})`;
}
