/**
 * The fixed-size instruction image produced by a successful assembly.
 */
export interface AssembledImage {
  /**
   * Exactly 64 bytes: encoded instructions in source order, then zero fill.
   */
  bytes: Uint8Array;
  /** Number of encoded instructions (the first `2 * instructionCount` bytes). */
  instructionCount: number;
  symbols: SymbolEntry[];
}

/**
 * A defined label, for listings.
 */
export interface SymbolEntry {
  kind: 'label';
  name: string;
  /** Instruction slot the label binds to (0..31). */
  slot: number;
  /** Byte offset of that slot in the image. */
  address: number;
  /** 1-based line of the definition. */
  line?: number;
}

/**
 * Options for Intel HEX writing.
 */
export interface WriteHexOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Number of bytes shown per dump line.
   */
  bytesPerLine?: number;
}

/**
 * In-memory Intel HEX artifact.
 */
export interface HexArtifact {
  kind: 'hex';
  path?: string;
  text: string;
}

/**
 * In-memory flat binary artifact.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the assembler.
 */
export type Artifact = HexArtifact | BinArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn an assembled image into artifacts.
 */
export interface FormatWriters {
  writeBin(image: AssembledImage): BinArtifact;
  writeHex(image: AssembledImage, opts?: WriteHexOptions): HexArtifact;
  writeListing?(image: AssembledImage, opts?: WriteListingOptions): ListingArtifact;
}
