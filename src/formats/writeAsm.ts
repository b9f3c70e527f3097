import type { AsmArtifact, WriteAsmOptions } from './types.js';

export const ASM_HEADER = '; generated by ternc';

/**
 * Create a `.asm` artifact from generated source lines.
 *
 * The text always ends with a line ending.
 */
export function writeAsm(lines: readonly string[], opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const out = opts?.header ? [ASM_HEADER, '', ...lines] : [...lines];
  return { kind: 'asm', text: out.join(lineEnding) + lineEnding };
}
