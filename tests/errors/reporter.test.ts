import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { formatFault, formatFaults } from "../../src/errors/reporter.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("formatFault", () => {
  it("prints kind and message", () => {
    expect(formatFault({ kind: "precondition", message: "module has imports" })).toBe(
      "error[precondition]: module has imports\n",
    );
  });

  it("points at the offending byte", () => {
    const bytes = Uint8Array.from([0x00, 0x61, 0x73, 0x6e, 0x01, 0x00, 0x00, 0x00]);
    const text = formatFault({ kind: "decode", message: "invalid magic number", offset: 3 }, { file: "a.wasm", bytes });
    expect(text).toBe(
      "error[decode]: invalid magic number\n" +
        "  --> a.wasm @ 0x3\n" +
        "         |\n" +
        "00000000 | 00 61 73 6e 01 00 00 00\n" +
        "         |          ^^\n",
    );
  });

  it("labels rows past the first", () => {
    const bytes = new Uint8Array(20).fill(0xab);
    const text = formatFault({ kind: "verify", message: "bad", offset: 17 }, { file: "b.wasm", bytes });
    expect(text.split("\n")[3]).toBe("00000010 | ab ab ab ab");
  });

  it("adds help and offsets without a source", () => {
    expect(formatFault({ kind: "export", message: "invocation was null", offset: 16, help: "boom" })).toBe(
      "error[export]: invocation was null\n  --> @ 0x10\n  = help: boom\n",
    );
  });
});

describe("formatFaults", () => {
  it("separates faults with a blank line", () => {
    const text = formatFaults([
      { kind: "precondition", message: "module has imports" },
      { kind: "precondition", message: "module has no exports" },
    ]);
    expect(text).toBe("error[precondition]: module has imports\n\nerror[precondition]: module has no exports\n");
  });
});
