/**
 * Raised when the parser and generator disagree about an item shape, or a span escapes its source.
 *
 * These are assembler bugs, not input errors: they are never turned into a {@link Diagnostic}.
 */
export class InternalAssemblerError extends Error {
  constructor(message: string) {
    super(`Internal assembler error: ${message}`);
    this.name = 'InternalAssemblerError';
  }
}
