#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath: string;
  lineEnding: '\n' | '\r\n';
  header: boolean;
};

function usage(): string {
  return [
    'ternc [options] <entry.tern>',
    '',
    'Options:',
    '  -o, --output <file>   Output path (must end in .asm; default: entry with .asm)',
    '      --crlf            Use CRLF line endings in the output',
    '      --header          Start the output with a generator comment',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.tern> must be the last argument.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from source, dist/src/cli.js when built.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    let pkg: unknown;
    try {
      pkg = JSON.parse(readFileSync(candidate, 'utf8'));
    } catch {
      continue;
    }
    if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && pkg.name === 'ternc') {
      return 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    }
  }
  return '0.0.0';
}

function defaultOutputPath(entryFile: string): string {
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}.asm`;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let lineEnding: '\n' | '\r\n' = '\n';
  let header = false;
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
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--crlf') {
      lineEnding = '\r\n';
      continue;
    }
    if (a === '--header') {
      header = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.tern> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.tern> argument (and it must be last)`);
  }
  if (outputPath !== undefined && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm"`);
  }

  return {
    entryFile,
    outputPath: outputPath !== undefined ? resolve(outputPath) : defaultOutputPath(entryFile),
    lineEnding,
    header,
  };
}

async function writeArtifacts(outputPath: string, artifacts: Artifact[]): Promise<void> {
  for (const artifact of artifacts) {
    const path = artifact.path ?? outputPath;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, artifact.text, 'utf8');
    process.stdout.write(`${path}\n`);
  }
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Format a diagnostic as `file:line:col: severity: [ID] message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      { outputPath: parsed.outputPath, lineEnding: parsed.lineEnding, header: parsed.header },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(parsed.outputPath, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ternc: ${msg}\n`);
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
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  return (
    normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
