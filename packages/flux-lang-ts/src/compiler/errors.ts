export interface UnmatchedCloseBracket {
  kind: 'UnmatchedCloseBracket';
  code: 'E_FLUX_UNMATCHED_CLOSE';
  /** Zero-based index of the offending `]` in the source string. */
  position: number;
}

export interface UnmatchedOpenBracket {
  kind: 'UnmatchedOpenBracket';
  code: 'E_FLUX_UNMATCHED_OPEN';
  /** Number of `[` still open at end of source. */
  count: number;
}

export type CompileError = UnmatchedCloseBracket | UnmatchedOpenBracket;

export function formatCompileError(error: CompileError): string {
  switch (error.kind) {
    case 'UnmatchedCloseBracket':
      return `unmatched ']' at position ${error.position}`;
    case 'UnmatchedOpenBracket':
      return `${error.count} unmatched '[' bracket(s) in source code`;
    default: {
      const _: never = error;
      throw new Error('unknown compile error');
    }
  }
}

export class FluxCompileError extends Error {
  constructor(readonly error: CompileError) {
    super(`${error.code}: ${formatCompileError(error)}`);
    this.name = 'FluxCompileError';
  }
}
