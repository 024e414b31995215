import chalk from "chalk";
import type { Fault } from "./fault.js";

export interface FaultSource {
  file: string;
  bytes: Uint8Array;
}

const ROW = 16;

function hexRow(bytes: Uint8Array, offset: number): string {
  const rowStart = offset - (offset % ROW);
  const cells = Array.from(bytes.subarray(rowStart, rowStart + ROW), (b) => b.toString(16).padStart(2, "0"));
  const label = rowStart.toString(16).padStart(8, "0");
  const padding = " ".repeat(label.length);

  let output = `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(label)} ${chalk.blue("|")} ${cells.join(" ")}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat((offset - rowStart) * 3)}${chalk.red("^^")}\n`;
  return output;
}

export function formatFault(fault: Fault, source?: FaultSource): string {
  let output = `${chalk.red.bold(`error[${fault.kind}]`)}: ${chalk.bold(fault.message)}\n`;

  if (fault.offset !== undefined) {
    const at = `0x${fault.offset.toString(16)}`;
    output += `  ${chalk.blue("-->")} ${source ? `${source.file} @ ${at}` : `@ ${at}`}\n`;
    if (source) output += hexRow(source.bytes, fault.offset);
  }

  if (fault.help) {
    output += `  ${chalk.blue("=")} ${chalk.green("help")}: ${fault.help}\n`;
  }

  return output;
}

export function formatFaults(faults: readonly Fault[], source?: FaultSource): string {
  return faults.map((f) => formatFault(f, source)).join("\n");
}
