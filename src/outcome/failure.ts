import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "invalid-transition"
  | "invalid-raw-value"
  | "invalid-definition"
  | "validation-failed"
  | "config-error"
  | "usage-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  /** False when retrying with other input cannot help. */
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}
