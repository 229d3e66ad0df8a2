import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Variant", template: "Unknown variant for {set}: {tag}" },
  E0101: { code: "E0101", severity: "error", category: "Variant", template: "Unknown event for {set}: {event}" },
  E0102: { code: "E0102", severity: "error", category: "Variant", template: "No raw value mapping for {set}: {raw}" },

  E0200: { code: "E0200", severity: "error", category: "Definition", template: "Overlapping ranges: {first} and {second}" },
  E0201: { code: "E0201", severity: "error", category: "Definition", template: "Empty or inverted range: {range}" },
  E0202: { code: "E0202", severity: "error", category: "Definition", template: "Duplicate raw value: {raw}" },
  E0203: { code: "E0203", severity: "error", category: "Definition", template: "Tag without successor: {tag}" },
  E0204: { code: "E0204", severity: "error", category: "Definition", template: "Tag listed twice in cycle: {tag}" },

  E0400: { code: "E0400", severity: "error", category: "Validation", template: "Validation failed" },
  E0401: { code: "E0401", severity: "error", category: "Validation", template: "Required argument missing: {field}" },

  E0500: { code: "E0500", severity: "error", category: "Config", template: "Config file not found: {path}" },
  E0501: { code: "E0501", severity: "error", category: "Config", template: "Unsupported config file format: {ext}" },
  E0502: { code: "E0502", severity: "error", category: "Config", template: "Config file is not valid JSON: {path}" },

  W0001: { code: "W0001", severity: "warning", category: "Config", template: "Config value is unusually high: {field}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  source?: string
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    source,
    data: params,
  };
}
