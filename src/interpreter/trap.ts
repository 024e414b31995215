export type TrapReason =
  | "unreachable"
  | "memory-out-of-bounds"
  | "divide-by-zero"
  | "integer-overflow"
  | "invalid-conversion"
  | "undefined-element"
  | "indirect-call-signature-mismatch"
  | "call-stack-exhausted"
  | "unlinked-import"
  | "invalid-code";

const TRAP_MESSAGES: Record<TrapReason, string> = {
  "unreachable": "unreachable executed",
  "memory-out-of-bounds": "memory access out of bounds",
  "divide-by-zero": "integer divide by zero",
  "integer-overflow": "integer overflow",
  "invalid-conversion": "invalid conversion to integer",
  "undefined-element": "undefined table element",
  "indirect-call-signature-mismatch": "indirect call signature mismatch",
  "call-stack-exhausted": "call stack exhausted",
  "unlinked-import": "call to an unlinked import",
  "invalid-code": "called function did not verify",
};

/** Thrown inside the engine; only `Thread.run()` catches it. */
export class Trap extends Error {
  constructor(readonly reason: TrapReason, readonly offset: number = -1) {
    super(TRAP_MESSAGES[reason]);
    this.name = "Trap";
  }
}
