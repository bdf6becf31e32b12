#!/usr/bin/env node
import { parseArgs } from 'util';
import { Context } from "./context";

const VERSION = '0.2.0';

const usage = `Stack++ ${VERSION}
A stack machine programming language

Usage: stackpp [file]

Arguments:
  [file]  Run the script file; starts an interactive session when omitted

Options:
  -h, --help     Print help
  -v, --version  Print version`;

export function main(argv: string[]): Promise<void> | void {
  let parsed;

  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      },
    });
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    console.error(usage);
    process.exitCode = 2;
    return;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    console.log(usage);
    return;
  } else if (values.version) {
    console.log(`Stack++ ${VERSION}`);
    return;
  }

  const context = new Context();
  const [file] = positionals;

  if (file != null) {
    context.runFile(file);
  } else {
    return context.repl();
  }
}

if (require.main === module) {
  Promise.resolve(main(process.argv.slice(2))).catch(e => {
    console.error(e);
    process.exitCode = 1;
  });
}
