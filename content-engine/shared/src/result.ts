// Result helpers used by batch operations that report per-item failures

export type ModuleError = {
  code: string;
  module: string;
  data: Record<string, unknown>;
  correlationId: string;
};

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; errors: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(errors: E): Result<never, E> {
  return { ok: false, errors };
}
