/** 1-based position of a token. */
export interface SourcePosition {
  line: number;
  column: number;
}

/** A Tern source text and the path it was read from. */
export interface SourceFile {
  readonly path: string;
  readonly text: string;
}

export function makeSourceFile(path: string, text: string): SourceFile {
  return { path, text };
}
