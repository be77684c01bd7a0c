import type { DumpOptions } from "./config";
import { formatHexGroups, formatOffset } from "../utils/hex";

type LayoutOptions = Pick<DumpOptions, "lineWidth" | "byteGroupLength">;

const OFFSET_WIDTH = 8;
const CONTROL_PICTURES_BASE = 0x2400;

/**
 * Width of the hex column for a full line: every group plus the single
 * spaces between them. Short final lines are padded to this.
 */
export function hexFieldWidth({ lineWidth, byteGroupLength }: LayoutOptions): number {
  return Math.floor(((2 * byteGroupLength + 1) * lineWidth - 1) / byteGroupLength);
}

export function formatByteChar(byte: number, controlPictures: boolean): string {
  if (byte < 0x20) {
    return controlPictures ? String.fromCodePoint(byte + CONTROL_PICTURES_BASE) : ".";
  }
  if (byte < 0x7f) {
    return String.fromCharCode(byte);
  }
  return ".";
}

export function formatAsciiField(bytes: Uint8Array, controlPictures: boolean): string {
  let out = "";
  for (const b of bytes) {
    out += formatByteChar(b, controlPictures);
  }
  return out;
}

export function formatHexField(bytes: ArrayLike<number>, options: LayoutOptions): string {
  return formatHexGroups(bytes, options.byteGroupLength).padEnd(hexFieldWidth(options));
}

export function formatLine(offset: number, bytes: Uint8Array, options: DumpOptions): string {
  const hex = formatHexField(bytes, options);
  const ascii = formatAsciiField(bytes, options.controlPictures);
  return `${formatOffset(offset)} | ${hex} | ${ascii}`;
}

/**
 * Column legend and rule printed above the data lines. The `+` joints of the
 * rule line up with the `|` separators of every data line.
 */
export function formatHeader(options: LayoutOptions): [string, string] {
  const indices = Array.from({ length: options.lineWidth }, (_, i) => i & 0xff);
  const legend = `${" ".repeat(OFFSET_WIDTH)} | ${formatHexField(indices, options)} | ${" ".repeat(options.lineWidth)}`;
  const rule = [
    "-".repeat(OFFSET_WIDTH + 1),
    "-".repeat(hexFieldWidth(options) + 2),
    "-".repeat(options.lineWidth + 1),
  ].join("+");
  return [legend, rule];
}
