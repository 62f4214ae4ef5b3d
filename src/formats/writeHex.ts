import { toHexByte } from './hexdump.js';
import type { AssembledImage, HexArtifact, WriteHexOptions } from './types.js';

function checksum(bytes: number[]): number {
  const sum = bytes.reduce((acc, b) => acc + (b & 0xff), 0) & 0xff;
  return ((0x100 - sum) & 0xff) >>> 0;
}

/**
 * Create an Intel HEX artifact covering the whole image.
 *
 * Emits 16-byte type-00 data records from address 0 and a type-01 EOF record.
 */
export function writeHex(image: AssembledImage, opts?: WriteHexOptions): HexArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const recordSize = 16;
  const lines: string[] = [];

  for (let addr = 0; addr < image.bytes.length; addr += recordSize) {
    const data = Array.from(image.bytes.subarray(addr, addr + recordSize));
    const hi = (addr >> 8) & 0xff;
    const lo = addr & 0xff;
    const header = [data.length, hi, lo, 0x00, ...data];
    const hexData = data.map(toHexByte).join('');
    lines.push(
      `:${toHexByte(data.length)}${toHexByte(hi)}${toHexByte(lo)}00${hexData}${toHexByte(
        checksum(header),
      )}`,
    );
  }

  lines.push(':00000001FF');
  return { kind: 'hex', text: lines.join(lineEnding) + lineEnding };
}
