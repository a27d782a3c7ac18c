export type CoreErrorKind = "not_found" | "unparseable" | "unavailable";

export interface CoreError {
  kind: CoreErrorKind;
  message: string;
}

export type Failure = { ok: false; error: CoreError };
export type Result<T> = { ok: true; value: T } | Failure;

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = (kind: CoreErrorKind, message: string): Failure => ({
  ok: false,
  error: { kind, message },
});
