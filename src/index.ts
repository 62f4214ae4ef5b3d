export { assemble, DEFAULT_FILE_NAME } from './assemble.js';
export { assembleFile } from './assembleFile.js';
export { renderDiagnostic } from './diagnostics/render.js';
export { InternalAssemblerError } from './diagnostics/internal.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export { formatHexDump } from './formats/hexdump.js';
export type {
  Artifact,
  AssembledImage,
  BinArtifact,
  FormatWriters,
  HexArtifact,
  ListingArtifact,
  SymbolEntry,
} from './formats/types.js';
export type {
  AssembleFileOptions,
  AssembleFileResult,
  AssembleResult,
  AssemblerOptions,
  PipelineDeps,
} from './pipeline.js';
export { INSTRUCTION_MEMORY_SIZE_BYTES, MAX_NUM_INSTRUCTIONS } from './isa/encoding.js';
