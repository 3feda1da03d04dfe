export class TreebankError extends Error {
  /**
   * @param message error message
   * @param cause source error (if any)
   */
  constructor(message: string, override cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    if (cause instanceof Error && cause.stack) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }
}

export class TreeSyntaxError extends TreebankError {
  constructor(
    readonly detail: string,
    readonly position: number,
    readonly lineNumber?: number,
  ) {
    super(lineNumber === undefined ? detail : `line ${lineNumber}: ${detail}`);
  }

  atLine(lineNumber: number): TreeSyntaxError {
    return new TreeSyntaxError(this.detail, this.position, lineNumber);
  }
}

export class StructuralInvariantError extends TreebankError {}

/** `hypothesisLength` and `goldLength` are leaf counts, or tree counts for a whole corpus. */
export class ScoringAlignmentError extends TreebankError {
  constructor(
    message: string,
    readonly hypothesisLength: number,
    readonly goldLength: number,
  ) {
    super(message);
  }
}
