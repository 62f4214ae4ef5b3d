#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { assembleFile } from './assembleFile.js';
import { InternalAssemblerError } from './diagnostics/internal.js';
import { renderDiagnostic } from './diagnostics/render.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { SourceFile } from './frontend/source.js';
import { defaultFormatWriters } from './formats/index.js';
import { formatHexDump } from './formats/hexdump.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type OutputType = 'bin' | 'hex';

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  outputType: OutputType;
  emitBin: boolean;
  emitHex: boolean;
  emitListing: boolean;
  dump: boolean;
};

function usage(): string {
  return [
    'nibasm [options] <source.asm>',
    '',
    'Options:',
    '  -o, --output <file>   Primary output path (must match --type extension)',
    '  -t, --type <type>     Primary output type: bin|hex (default: bin)',
    '  -n, --nolist          Suppress .lst',
    '      --nobin           Suppress .bin',
    '      --nohex           Suppress .hex',
    '  -d, --dump            Print a hex dump of the 64-byte image',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <source.asm> must be the last argument.',
    '  - Output artifacts are written next to the primary output using the artifact base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // src/ when run from sources, dist/src/ when built.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  const packageJsonPath = candidates.find((p) => existsSync(p));
  if (!packageJsonPath) return '0.0.0';
  const pkg: unknown = require(packageJsonPath);
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function parseOutputType(flag: string, v: string | undefined): OutputType {
  if (!v) fail(`${flag} expects a value`);
  if (v !== 'hex' && v !== 'bin') fail(`Unsupported --type "${v}" (expected bin|hex)`);
  return v;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let outputType: OutputType = 'bin';
  let emitBin = true;
  let emitHex = true;
  let emitListing = true;
  let dump = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`--output expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-t' || a === '--type' || a.startsWith('--type=')) {
      outputType = a.startsWith('--type=')
        ? parseOutputType('--type', a.slice('--type='.length))
        : parseOutputType(a, argv[++i]);
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--nobin') {
      emitBin = false;
      continue;
    }
    if (a === '--nohex') {
      emitHex = false;
      continue;
    }
    if (a === '-d' || a === '--dump') {
      dump = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <source.asm> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <source.asm> argument (and it must be last)`);
  }

  if (outputType === 'hex' && !emitHex) fail(`--type hex requires HEX output to be enabled`);
  if (outputType === 'bin' && !emitBin) fail(`--type bin requires BIN output to be enabled`);

  if (outputPath) {
    const ext = extname(outputPath).toLowerCase();
    const wantExt = `.${outputType}`;
    if (ext !== wantExt) {
      fail(`--output must end with "${wantExt}" when --type is "${outputType}"`);
    }
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    outputType,
    emitBin,
    emitHex,
    emitListing,
    dump,
  };
}

/**
 * Artifact path without extension: the `--output` path, or the source path, minus its extension.
 */
export function artifactBase(entryFile: string, outputPath?: string): string {
  const p = resolve(outputPath ?? entryFile);
  const ext = extname(p);
  return ext.length > 0 ? p.slice(0, -ext.length) : p;
}

async function writeArtifacts(
  base: string,
  artifacts: Artifact[],
  outputType: OutputType,
): Promise<void> {
  const binPath = `${base}.bin`;
  const hexPath = `${base}.hex`;
  const lstPath = `${base}.lst`;

  await mkdir(dirname(base), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const a of artifacts) {
    switch (a.kind) {
      case 'bin':
        writes.push(writeFile(binPath, a.bytes));
        break;
      case 'hex':
        writes.push(writeFile(hexPath, a.text, 'utf8'));
        break;
      case 'lst':
        writes.push(writeFile(lstPath, a.text, 'utf8'));
        break;
    }
  }
  await Promise.all(writes);

  process.stdout.write(`${outputType === 'hex' ? hexPath : binPath}\n`);
}

function reportDiagnostic(d: Diagnostic, source: SourceFile | undefined): void {
  if (source) {
    process.stderr.write(renderDiagnostic(d, source));
    return;
  }
  process.stderr.write(`${d.file}: ${d.severity}: [${d.id}] ${d.message}\n`);
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const base = artifactBase(parsed.entryFile, parsed.outputPath);

    const res = await assembleFile(
      parsed.entryFile,
      {
        emitBin: parsed.emitBin,
        emitHex: parsed.emitHex,
        emitListing: parsed.emitListing,
      },
      { formats: defaultFormatWriters },
    );

    // Assembly is fail-fast, so there is at most one diagnostic.
    const [first] = res.diagnostics;
    if (first) {
      reportDiagnostic(first, res.source);
      return 1;
    }

    if (parsed.dump && res.image) {
      process.stdout.write(formatHexDump(res.image.bytes).join('\n') + '\n');
    }

    await writeArtifacts(base, res.artifacts, parsed.outputType);
    return 0;
  } catch (err) {
    if (err instanceof InternalAssemblerError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`nibasm: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
