import type { Module } from "../binary/module.js";
import type { Fault, Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";

/**
 * Harness preconditions shared by both execution paths. Both checks always
 * run, so a module breaking both gets both faults.
 */
export function checkPreconditions(module: Module): Result<Module> {
  const faults: Fault[] = [];
  if (module.imports.length > 0) faults.push(fault("precondition", "module has imports"));
  if (module.exports.length === 0) faults.push(fault("precondition", "module has no exports"));
  return faults.length > 0 ? fail(...faults) : ok(module);
}
