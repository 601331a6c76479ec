/**
 * jawadb command-line program
 *
 * Every command opens the document named by --file (or JAWADB_FILE), runs one
 * operation and closes it again, which saves the file if the operation changed it.
 */

import { Command, CommanderError } from "commander";
import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  withDocument,
  type JsonDocument,
  type JsonValue,
  type OpenOptions,
} from "@jawadb/sdk";
import { parseIndent, parseIndex, parseJson, parseJsonArray } from "./lib/arg.js";
import { isVerbose, resolveFile } from "./lib/env.js";
import { colorize, renderJson, renderLines } from "./lib/render.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

/**
 * Output channels the program writes to
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Colorize error output */
  isErrTTY?: boolean;
}

type GlobalOptions = {
  file?: string;
  indent: number;
  sortKeys?: boolean;
  verbose?: boolean;
};

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  isErrTTY: process.stderr.isTTY,
};

/**
 * Build the commander program. Errors are thrown rather than exiting the process.
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  // Settings are copied into subcommands when they are added, so configure first
  program
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.isErrTTY ?? false)),
    });

  program
    .name("jawadb")
    .description("jawadb - file-backed JSON documents with atomic saves")
    .version(VERSION)
    .option("-f, --file <path>", "Document file (default: $JAWADB_FILE or ./db.json)")
    .option("--indent <n>", "Spaces per indentation level when writing", parseIndent, 2)
    .option("--sort-keys", "Write mapping keys in sorted order")
    .option("--verbose", "Verbose diagnostics");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const verbose = (): boolean => Boolean(globals().verbose) || isVerbose();

  /**
   * Run `fn` against the selected document with timing diagnostics
   */
  const useDocument = async (
    label: string,
    fn: (doc: JsonDocument) => void
  ): Promise<void> => {
    const opts = globals();
    const options: OpenOptions = {
      indent: opts.indent,
      sortKeys: Boolean(opts.sortKeys),
      register: false,
    };
    await withTiming(
      label,
      () => withDocument(resolveFile(opts.file), fn, options),
      verbose() ? io.stderr : undefined
    );
  };

  const layout = () => ({ indent: globals().indent, sortKeys: Boolean(globals().sortKeys) });

  // Show command
  program
    .command("show")
    .description("Print the whole document")
    .action(async () => {
      await useDocument("cli.show", (doc) => {
        io.stdout(`${doc.toString()}\n`);
      });
    });

  // Get command
  program
    .command("get")
    .description("Print the value stored under a key")
    .argument("<key>", "Mapping key")
    .action(async (key: string) => {
      await useDocument("cli.get", (doc) => {
        const value = doc.get(key);
        if (value === undefined) {
          throw new KeyNotFoundError(key);
        }
        io.stdout(renderJson(value, layout()));
      });
    });

  // Set command
  program
    .command("set")
    .description("Store a JSON value under a key")
    .argument("<key>", "Mapping key")
    .argument("<value>", "JSON value", (value: string) => parseJson(value, "value"))
    .action(async (key: string, value: JsonValue) => {
      await useDocument("cli.set", (doc) => {
        doc.set(key, value);
      });
    });

  // Delete command
  program
    .command("delete")
    .description("Remove a key")
    .argument("<key>", "Mapping key")
    .action(async (key: string) => {
      await useDocument("cli.delete", (doc) => {
        doc.delete(key);
      });
    });

  // Has command
  program
    .command("has")
    .description("Print true if the key is present, false otherwise")
    .argument("<key>", "Mapping key")
    .action(async (key: string) => {
      await useDocument("cli.has", (doc) => {
        io.stdout(`${doc.has(key)}\n`);
      });
    });

  // Keys command
  program
    .command("keys")
    .description("List mapping keys in document order")
    .action(async () => {
      await useDocument("cli.keys", (doc) => {
        io.stdout(renderLines(doc.keys()));
      });
    });

  // Append command
  program
    .command("append")
    .description("Append a JSON value to the sequence")
    .argument("<value>", "JSON value", (value: string) => parseJson(value, "value"))
    .action(async (value: JsonValue) => {
      await useDocument("cli.append", (doc) => {
        doc.append(value);
      });
    });

  // Extend command
  program
    .command("extend")
    .description("Append every element of a JSON array to the sequence")
    .argument("<values>", "JSON array", (value: string) => parseJsonArray(value, "values"))
    .action(async (values: JsonValue[]) => {
      await useDocument("cli.extend", (doc) => {
        doc.extend(values);
      });
    });

  // At command
  program
    .command("at")
    .description("Print the sequence element at an index (use -- before negative indices)")
    .argument("<index>", "Element index; negative counts from the end", parseIndex)
    .action(async (index: number) => {
      await useDocument("cli.at", (doc) => {
        const value = doc.at(index);
        if (value === undefined) {
          throw new IndexOutOfRangeError(index, doc.length);
        }
        io.stdout(renderJson(value, layout()));
      });
    });

  // Length command
  program
    .command("length")
    .description("Print the number of sequence elements")
    .action(async () => {
      await useDocument("cli.length", (doc) => {
        io.stdout(`${doc.length}\n`);
      });
    });

  return program;
}

/**
 * Parse `argv` (user arguments only) and run the selected command
 * @returns Process exit code
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander already reported its own usage errors, help and version output
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = Boolean(program.opts<GlobalOptions>().verbose) || isVerbose();
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", io.isErrTTY ?? false));
    return mapErrorToExitCode(err);
  }
}
