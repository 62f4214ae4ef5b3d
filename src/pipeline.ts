import type { Diagnostic } from './diagnostics/types.js';
import type { SourceFile } from './frontend/source.js';
import type { Artifact, AssembledImage, FormatWriters } from './formats/types.js';

/**
 * Options for the in-memory core.
 */
export interface AssemblerOptions {
  /** Path shown in diagnostics (default: `<source>`). */
  fileName?: string;
}

/**
 * Outcome of assembling one source unit: the 64-byte image, or the first error found.
 */
export type AssembleResult =
  | ({ ok: true; source: SourceFile } & AssembledImage)
  | { ok: false; source: SourceFile; diagnostic: Diagnostic };

/**
 * Options that decide which artifacts a file assembly produces.
 */
export interface AssembleFileOptions {
  /** Emit flat binary (`.bin`). */
  emitBin?: boolean;
  /** Emit Intel HEX (`.hex`). */
  emitHex?: boolean;
  /** Emit listing (`.lst`). */
  emitListing?: boolean;
}

/**
 * Result of a file assembly run: diagnostics plus any produced artifacts.
 */
export interface AssembleFileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** The loaded source, when the file could be read. Needed to render diagnostics with context. */
  source?: SourceFile;
  /** The assembled image, when assembly succeeded. */
  image?: AssembledImage;
}

/**
 * Dependency injection surface for the file pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level file assembly signature used by the pipeline contract.
 */
export type AssembleFileFn = (
  entryFile: string,
  options: AssembleFileOptions,
  deps: PipelineDeps,
) => Promise<AssembleFileResult>;
