export type ValidationDiagnostic = {
  /** 1-based line in the serialized document, when the validator reported one. */
  line: number | null;
  message: string;
};

export type ValidationResult = {
  valid: boolean;
  diagnostics: ValidationDiagnostic[];
};

export function formatDiagnostic(d: ValidationDiagnostic): string {
  return d.line === null ? d.message : `line ${d.line}: ${d.message}`;
}
