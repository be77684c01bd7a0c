export function formatHexByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

export function formatOffset(offset: number): string {
  return offset.toString(16).padStart(8, "0");
}

/**
 * Hex digits of each group concatenated, groups joined by one space.
 */
export function formatHexGroups(bytes: ArrayLike<number>, groupLength: number): string {
  const groups: string[] = [];
  for (let i = 0; i < bytes.length; i += groupLength) {
    let group = "";
    const end = Math.min(i + groupLength, bytes.length);
    for (let j = i; j < end; j++) {
      group += formatHexByte(bytes[j]);
    }
    groups.push(group);
  }
  return groups.join(" ");
}
