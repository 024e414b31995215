#!/usr/bin/env node
import { Command } from "commander";
import { decodeModule } from "./binary/decoder.js";
import { describeModule, loadModuleBytes, parseEntry, parseHostArgs, parseInterpreterArgs } from "./cli/options.js";
import { loadConfig } from "./config/config.js";
import { formatFaults } from "./errors/reporter.js";
import { decodeForTesting, runModule, type ExecutionMode } from "./harness/harness.js";

interface RunOptions {
  asm?: boolean;
  function?: string;
  interpret?: boolean;
  args?: string[];
  stepBound?: string;
}

interface DialectOptions {
  asm?: boolean;
}

const program = new Command()
  .name("wasm-harness")
  .description("Decode, verify and run WebAssembly modules on the host engine or the built-in interpreter")
  .version("0.1.0");

program
  .command("run <file>")
  .description("Run an entry point of a .wasm or .wat module and print its int32 result")
  .option("--asm", "Treat the module as asm.js origin")
  .option("-f, --function <entry>", "Export name or function index to call")
  .option("-i, --interpret", "Run on the interpreter instead of the host engine")
  .option("-a, --args <values...>", "Arguments to pass to the entry point")
  .option("--step-bound <n>", "Interpreter step bound")
  .action(async (file: string, opts: RunOptions) => {
    const config = loadConfig();
    const bytes = await loadModuleBytes(file);
    if (!bytes.ok) {
      console.error(formatFaults(bytes.faults));
      process.exit(1);
    }
    const source = { file, bytes: bytes.value };

    const decoded = decodeForTesting(bytes.value, opts.asm ? "asm-js" : "wasm");
    if (!decoded.ok) {
      console.error(formatFaults(decoded.faults, source));
      process.exit(1);
    }
    const module = decoded.value;

    if (opts.stepBound !== undefined) {
      const bound = Number(opts.stepBound);
      if (!Number.isInteger(bound) || bound <= 0) {
        console.error(`Error: --step-bound must be a positive integer, got '${opts.stepBound}'`);
        process.exit(1);
      }
      config.stepBound = bound;
    }

    const entry = parseEntry(opts.function ?? (opts.asm ? "caller" : "main"));
    const rawArgs = opts.args ?? [];
    let mode: ExecutionMode;
    if (opts.interpret) {
      const args = parseInterpreterArgs(module, entry, rawArgs);
      if (!args.ok) {
        console.error(formatFaults(args.faults));
        process.exit(1);
      }
      mode = { kind: "interpreted", args: args.value };
    } else {
      const args = parseHostArgs(rawArgs);
      if (!args.ok) {
        console.error(formatFaults(args.faults));
        process.exit(1);
      }
      mode = { kind: "compiled", asmJs: opts.asm ?? false, args: args.value };
    }

    config.logger.info(`running ${file} (${mode.kind}) entry ${entry}`);
    const outcome = runModule(module, entry, mode, config);
    switch (outcome.status) {
      case "finished":
        console.log(outcome.value);
        return;
      case "trapped":
        console.log(`trap: ${outcome.message}`);
        console.log(outcome.value);
        process.exit(2);
      case "failed":
        console.error(formatFaults(outcome.faults, source));
        process.exit(1);
    }
  });

program
  .command("inspect <file>")
  .description("Print the structure of a .wasm or .wat module")
  .option("--asm", "Treat the module as asm.js origin")
  .action(async (file: string, opts: DialectOptions) => {
    const bytes = await loadModuleBytes(file);
    if (!bytes.ok) {
      console.error(formatFaults(bytes.faults));
      process.exit(1);
    }
    const decoded = decodeForTesting(bytes.value, opts.asm ? "asm-js" : "wasm");
    if (!decoded.ok) {
      console.error(formatFaults(decoded.faults, { file, bytes: bytes.value }));
      process.exit(1);
    }
    for (const line of describeModule(decoded.value)) console.log(line);
  });

program
  .command("verify <file>")
  .description("Decode a module and verify every function body")
  .option("--asm", "Treat the module as asm.js origin")
  .action(async (file: string, opts: DialectOptions) => {
    const bytes = await loadModuleBytes(file);
    if (!bytes.ok) {
      console.error(formatFaults(bytes.faults));
      process.exit(1);
    }
    const decoded = decodeModule(bytes.value, opts.asm ? "asm-js" : "wasm", { verifyFunctions: true });
    if (!decoded.ok) {
      console.error(formatFaults(decoded.faults, { file, bytes: bytes.value }));
      process.exit(1);
    }
    console.log("ok");
  });

await program.parseAsync();
