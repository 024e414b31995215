export type FaultKind =
  | "decode"
  | "precondition"
  | "compile"
  | "instantiate"
  | "export"
  | "verify"
  | "argument"
  | "step-bound";

export interface Fault {
  kind: FaultKind;
  message: string;
  /** Absolute byte offset into the module, when the fault has a location. */
  offset?: number;
  help?: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; faults: Fault[] };

export function fault(kind: FaultKind, message: string, offset?: number, help?: string): Fault {
  const f: Fault = { kind, message };
  if (offset !== undefined) f.offset = offset;
  if (help !== undefined) f.help = help;
  return f;
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(...faults: Fault[]): Result<T> {
  return { ok: false, faults };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
