import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { assemble } from './assemble.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import type {
  AssembleFileFn,
  AssembleFileOptions,
  AssembleFileResult,
  PipelineDeps,
} from './pipeline.js';

function withDefaults(
  options: AssembleFileOptions,
): Required<Pick<AssembleFileOptions, 'emitBin' | 'emitHex' | 'emitListing'>> {
  const anyPrimaryEmitSpecified = [options.emitBin, options.emitHex].some((v) => v !== undefined);

  const emitBin = anyPrimaryEmitSpecified ? (options.emitBin ?? false) : true;
  const emitHex = anyPrimaryEmitSpecified ? (options.emitHex ?? false) : true;

  // Listing is a sidecar artifact: default to on unless explicitly suppressed.
  const emitListing = options.emitListing ?? true;

  return { emitBin, emitHex, emitListing };
}

/**
 * Assemble a source file from disk.
 *
 * Reads the file, runs {@link assemble}, and produces artifacts in-memory via `deps.formats` (nothing is
 * written). Defaults to emitting BIN + HEX + listing unless an emit flag is explicitly provided.
 */
export const assembleFile: AssembleFileFn = async (
  entryFile: string,
  options: AssembleFileOptions,
  deps: PipelineDeps,
): Promise<AssembleFileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read source file: ${String(err)}`,
      file: entryFile,
    });
    return { diagnostics, artifacts: [] };
  }

  const res = assemble(text, { fileName: entryFile });
  if (!res.ok) {
    diagnostics.push(res.diagnostic);
    return { diagnostics, artifacts: [], source: res.source };
  }

  const image = {
    bytes: res.bytes,
    instructionCount: res.instructionCount,
    symbols: res.symbols,
  };
  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitBin) {
    artifacts.push(deps.formats.writeBin(image));
  }
  if (emit.emitHex) {
    artifacts.push(deps.formats.writeHex(image));
  }
  if (emit.emitListing && deps.formats.writeListing) {
    artifacts.push(deps.formats.writeListing(image));
  }

  return { diagnostics, artifacts, source: res.source, image };
};
