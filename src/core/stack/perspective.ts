// src/core/stack/perspective.ts
// Read/write policy laid over a stack's storage

export type PerspectiveMode = "lifo" | "fifo";

/**
 * Perspective: maps a logical depth (0 = designated top) to a storage index.
 * Switching perspective never moves an element.
 */
export interface Perspective {
  readonly mode: PerspectiveMode;
  /** Storage index of the element at `depth`, for a sequence of `length`. */
  indexOf(depth: number, length: number): number;
  /** Storage index a push inserts at. */
  insertionIndex(length: number): number;
}

export const LIFO: Perspective = {
  mode: "lifo",
  indexOf: (depth, length) => length - 1 - depth,
  insertionIndex: (length) => length,
};

export const FIFO: Perspective = {
  mode: "fifo",
  indexOf: (depth) => depth,
  insertionIndex: () => 0,
};

export function perspectiveFor(mode: PerspectiveMode): Perspective {
  return mode === "lifo" ? LIFO : FIFO;
}

export function flipped(p: Perspective): Perspective {
  return p.mode === "lifo" ? FIFO : LIFO;
}

export function parsePerspectiveMode(text: string): PerspectiveMode | undefined {
  const lowered = text.trim().toLowerCase();
  if (lowered === "lifo" || lowered === "fifo") return lowered;
  return undefined;
}

/**
 * Render elements in storage order with the designated end bracketed:
 * LIFO `1 2 [3]`, FIFO `[1] 2 3`.
 */
export function renderItems(items: readonly string[], p: Perspective): string {
  if (items.length === 0) return "empty";
  const top = p.indexOf(0, items.length);
  return items.map((item, i) => (i === top ? `[${item}]` : item)).join(" ");
}
