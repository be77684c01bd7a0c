export type ScrollAction = "lineDown" | "lineUp" | "pageDown" | "pageUp" | "top" | "bottom";

// Rows taken by the pinned header pair, the status line and one spare row
// so ink never fills the last terminal line.
const RESERVED_ROWS = 4;

export function visibleRowCount(terminalRows: number): number {
  return Math.max(1, terminalRows - RESERVED_ROWS);
}

export function maxScroll(total: number, visible: number): number {
  return Math.max(0, total - visible);
}

export function clampScroll(offset: number, total: number, visible: number): number {
  return Math.max(0, Math.min(offset, maxScroll(total, visible)));
}

export function applyScroll(action: ScrollAction, offset: number, total: number, visible: number): number {
  switch (action) {
    case "lineDown":
      return clampScroll(offset + 1, total, visible);
    case "lineUp":
      return clampScroll(offset - 1, total, visible);
    case "pageDown":
      return clampScroll(offset + visible, total, visible);
    case "pageUp":
      return clampScroll(offset - visible, total, visible);
    case "top":
      return 0;
    case "bottom":
      return maxScroll(total, visible);
  }
}

/** "12-40 of 300", 1-based and inclusive; "0 of 0" for an empty dump. */
export function describeRange(offset: number, total: number, visible: number): string {
  if (total === 0) return "0 of 0";
  const last = Math.min(total, offset + visible);
  return `${offset + 1}-${last} of ${total}`;
}
