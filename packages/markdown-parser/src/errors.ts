export type DiagnosticKind = "unresolved_footnote" | "duplicate_footnote";

export interface Diagnostic {
  kind: DiagnosticKind;
  label: string;
  message: string;
  /** 1-based source line, when the diagnostic comes from the block phase. */
  line?: number;
}

/**
 * Thrown before any parsing happens when the caller hands in something that
 * is not a document or passes unusable options.
 */
export class InvalidInputError extends Error {
  readonly kind = "InvalidInput";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class DiagnosticsError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(
      `Document has ${diagnostics.length} diagnostic(s): ` +
        diagnostics.map((d) => d.message).join("; "),
    );
    this.name = "DiagnosticsError";
    this.diagnostics = diagnostics;
  }
}

export function assertNoDiagnostics(result: { diagnostics: Diagnostic[] }) {
  if (result.diagnostics.length > 0) {
    throw new DiagnosticsError(result.diagnostics);
  }
}
