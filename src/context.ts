import fs from 'fs';
import { createInterface, type Interface } from 'readline';
import tty from 'tty';
import { type Program, show, showProgram } from "./ast";
import { Interpreter } from "./interpreter";
import { Machine } from "./machine";

type LineSource = () => Promise<string | null>;

/**
 * Ties one machine to one interpreter for the file runner and the interactive
 * session. State carries over between everything run through the same context.
 * Reports (banner, `AST`/`Result`, memory listings) go to the console; program
 * output goes through the interpreter's terminal.
 */
export class Context {

  constructor(readonly machine: Machine = new Machine(), readonly interpreter: Interpreter = new Interpreter()) {
  }

  runFile(path: string): boolean {
    let source: string;

    try {
      source = fs.readFileSync(path, 'utf8');
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      console.error(`Error! failed to open the file ${path}: ${reason}`);
      process.exitCode = 1;
      return false;
    }

    this.interpreter.eval(source, this.machine);
    return true;
  }

  runChunk(source: string): Program {
    return this.interpreter.eval(source, this.machine);
  }

  report(program: Program): void {
    console.log(`AST    : ${showProgram(program)}`);
    console.log(`Result : ${showProgram(this.machine.stack)}`);

    for (const [name, value] of this.machine.memory) {
      console.log(`  $${name} = ${show(value)}`);
    }
  }

  /**
   * With an input stream, lines come from a line editor over it; standard input
   * gets one when it is a terminal. Otherwise lines come from the interpreter's
   * terminal, the same place `input` reads from, so a piped session and the
   * program share one stream.
   */
  async repl(input: NodeJS.ReadableStream | null = tty.isatty(0) ? process.stdin : null): Promise<void> {
    console.log('Stack++');

    if (input == null) {
      const terminal = this.interpreter.terminal;

      await this.session(async () => terminal.readLine(), chunk => this.evaluateChunk(chunk));
      return;
    }

    const output = input === process.stdin ? process.stdout : undefined;
    const prompt = createInterface({ input, output, prompt: '> ' });
    const lines = prompt[Symbol.asyncIterator]();
    let closed = false;

    prompt.once('close', () => {
      closed = true;
    });

    // lines read before the input closed are still buffered in the iterator
    const ask = async (): Promise<string | null> => {
      if (!closed) {
        prompt.prompt();
      }

      const next = await lines.next();
      return next.done ? null : next.value;
    };

    try {
      await this.session(ask, chunk => this.evaluateEdited(prompt, chunk));
    } finally {
      if (!closed) {
        prompt.close();
      }
    }
  }

  private async session(ask: LineSource, evaluate: (chunk: string) => void): Promise<void> {
    while (true) {
      const chunk = await readChunk(ask);

      if (chunk == null) {
        return;
      }

      const command = chunk.trim();

      if (command === '') {
        continue;
      } else if (command === ':exit') {
        return;
      } else if (command === ':reset') {
        this.machine.reset();
        continue;
      } else if (command === ':memory') {
        this.listMemory();
        continue;
      }

      evaluate(chunk);
    }
  }

  private listMemory(): void {
    for (const [name, value] of this.machine.memory) {
      console.log(`$${name} = ${show(value)}`);
    }
  }

  private evaluateChunk(chunk: string): void {
    try {
      this.report(this.runChunk(chunk));
    } catch (e) {
      console.log(e instanceof Error ? e.message : String(e));
    }
  }

  private evaluateEdited(prompt: Interface, chunk: string): void {
    // `input` reads the descriptor directly, so the line editor has to let go of it
    prompt.pause();
    const raw = process.stdin.isTTY && prompt.terminal;

    if (raw) {
      process.stdin.setRawMode(false);
    }

    try {
      this.evaluateChunk(chunk);
    } finally {
      if (raw) {
        process.stdin.setRawMode(true);
      }

      prompt.resume();
    }
  }
}

// Lines accumulate until a blank one. Null once the input is closed.
async function readChunk(ask: LineSource): Promise<string | null> {
  let code = '';

  while (true) {
    const line = await ask();

    if (line == null) {
      return code === '' ? null : code;
    }

    code += `${line}\n`;

    if (line === '') {
      return code;
    }
  }
}
