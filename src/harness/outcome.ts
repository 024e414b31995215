import type { Fault } from "../errors/fault.js";
import type { TrapReason } from "../interpreter/trap.js";

/** 0xdeadbeef as a signed 32-bit integer. */
export const TRAP_SENTINEL = 0xdeadbeef | 0;

export const HARNESS_FAILURE = -1;

export type ExecutionOutcome =
  | { status: "finished"; value: number }
  | { status: "trapped"; value: typeof TRAP_SENTINEL; reason: TrapReason; message: string; offset: number }
  | { status: "failed"; value: typeof HARNESS_FAILURE; faults: Fault[] };

export function finished(value: number): ExecutionOutcome {
  return { status: "finished", value: value | 0 };
}

export function trapped(reason: TrapReason, message: string, offset: number): ExecutionOutcome {
  return { status: "trapped", value: TRAP_SENTINEL, reason, message, offset };
}

export function failed(faults: Fault[]): ExecutionOutcome {
  return { status: "failed", value: HARNESS_FAILURE, faults };
}
