import { formatHexDump, toHexByte } from './hexdump.js';
import type { AssembledImage, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';

function formatSymbol(s: SymbolEntry): string {
  const where = s.line === undefined ? '' : ` line ${s.line}`;
  return `${s.kind} ${s.name} = ${s.slot} ($${toHexByte(s.address)})${where}`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  if (a.slot !== b.slot) return a.slot - b.slot;
  return a.name.localeCompare(b.name);
}

/**
 * Create a deterministic `.lst` listing artifact: a dump of the image plus the label table.
 */
export function writeListing(image: AssembledImage, opts?: WriteListingOptions): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const bytesPerLine = opts?.bytesPerLine ?? 16;

  const lines: string[] = [];
  lines.push('; nibasm listing');
  lines.push(`; instructions: ${image.instructionCount}, bytes: ${image.bytes.length}`);
  lines.push('');
  lines.push(...formatHexDump(image.bytes, bytesPerLine));
  lines.push('');
  lines.push('; symbols:');
  for (const s of [...image.symbols].sort(sortSymbols)) {
    lines.push(`; ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
