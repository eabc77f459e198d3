export type OkEnvelope<T> = { ok: true } & T;
export type FailEnvelope<T = Record<never, never>> = { ok: false; error: string } & T;

export function ok<T extends Record<string, unknown>>(payload: T): OkEnvelope<T> {
  return { ok: true, ...payload };
}

export function fail(error: string): FailEnvelope;
export function fail<T extends Record<string, unknown>>(error: string, payload: T): FailEnvelope<T>;
export function fail(error: string, payload: Record<string, unknown> = {}): FailEnvelope<Record<string, unknown>> {
  return { ...payload, ok: false, error };
}
