import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Diagnostic } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * A tag or event outside a closed variant set reached an untyped boundary.
 * `kind` says which of the two it was.
 */
export function invalidTransition(
  set: string,
  value: string,
  kind: "variant" | "event" = "variant",
  meta: OutcomeMeta = {}
): Fail {
  const diagnostic =
    kind === "variant"
      ? makeDiagnostic("E0100", { set, tag: value }, meta.source)
      : makeDiagnostic("E0101", { set, event: value }, meta.source);
  return fail(
    failure("invalid-transition", diagnostic.message, {
      diagnostics: [diagnostic],
      context: { set, [kind === "variant" ? "tag" : "event"]: value },
      recoverable: true,
    }),
    meta
  );
}

export function invalidRawValue(set: string, raw: unknown, meta: OutcomeMeta = {}): Fail {
  const shown = typeof raw === "string" ? raw : JSON.stringify(raw) ?? String(raw);
  const diagnostic = makeDiagnostic("E0102", { set, raw: shown }, meta.source);
  return fail(
    failure("invalid-raw-value", diagnostic.message, {
      diagnostics: [diagnostic],
      context: { set, raw },
      recoverable: true,
    }),
    meta
  );
}

export function validationFailed(
  message: string,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("validation-failed", message, {
      diagnostics: [makeDiagnostic("E0400", undefined, meta.source)],
      context,
      recoverable: true,
    }),
    meta
  );
}

export function usageError(message: string, field?: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("usage-error", message, {
      diagnostics: field ? [makeDiagnostic("E0401", { field }, meta.source)] : [],
      recoverable: true,
    }),
    meta
  );
}

/**
 * A classifier, table or raw-value map that could not be defined, e.g. from
 * thresholds read at run time.
 */
export function invalidDefinition(definition: string, diagnostics: Diagnostic[], meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("invalid-definition", `Invalid definition of ${definition}: ${diagnostics.map(d => d.message).join("; ")}`, {
      diagnostics,
      context: { definition },
      recoverable: false,
    }),
    meta
  );
}

export function configError(diagnostic: Diagnostic, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("config-error", diagnostic.message, {
      diagnostics: [diagnostic],
      context: diagnostic.data,
      recoverable: false,
    }),
    meta
  );
}
