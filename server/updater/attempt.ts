import { toErrorMessage } from "./errors.js";

export type Attempt<T = void> =
  | { status: "ok"; value: T }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: string };

export function succeeded<T>(value: T): Attempt<T> {
  return { status: "ok", value };
}

export function skipped<T = never>(reason: string): Attempt<T> {
  return { status: "skipped", reason };
}

export function failed<T = never>(error: string): Attempt<T> {
  return { status: "failed", error };
}

/**
 * Runs a step whose failure must not escape. The thrown error is reduced to
 * its message so callers can only log or report it.
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return succeeded(await operation());
  } catch (error) {
    return failed(toErrorMessage(error));
  }
}

export function describeAttempt(value: Attempt<unknown>): string | undefined {
  switch (value.status) {
    case "ok":
      return undefined;
    case "skipped":
      return value.reason;
    case "failed":
      return value.error;
  }
}
