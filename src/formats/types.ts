/**
 * Options for `.asm` source emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Prefix the text with a `; generated by ternc` comment line.
   */
  header?: boolean;
}

/**
 * In-memory NASM source artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact;

/**
 * Format writers used by the pipeline to turn generated lines into artifacts.
 */
export interface FormatWriters {
  writeAsm(lines: readonly string[], opts?: WriteAsmOptions): AsmArtifact;
}
