export type DiagnosticSeverity = "error" | "warning";

/** One coded finding attached to a failure or a definition error. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Where it was found: a definition name, a config file, "cli". */
  source?: string;
  data?: Record<string, unknown>;
}
