export function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Offset-prefixed hex dump, `bytesPerLine` bytes per line:
 *
 * ```text
 * 0000: 11 20 00 00 ...
 * ```
 */
export function formatHexDump(bytes: Uint8Array, bytesPerLine = 16): string[] {
  const lines: string[] = [];
  for (let addr = 0; addr < bytes.length; addr += bytesPerLine) {
    const row = Array.from(bytes.subarray(addr, addr + bytesPerLine), toHexByte);
    lines.push(`${toHexWord(addr)}: ${row.join(' ')}`);
  }
  return lines;
}
