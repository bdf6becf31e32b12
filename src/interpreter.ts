import type { Program } from "./ast";
import { type CoreLib, initCoreLib, type Runtime } from "./lib";
import { Machine } from "./machine";
import { parse } from "./parser";
import { ProcessTerminal, type Terminal } from "./terminal";

export class Interpreter implements Runtime {

  private readonly lib: CoreLib = initCoreLib();

  constructor(readonly terminal: Terminal = new ProcessTerminal()) {
  }

  eval(raw: string, machine: Machine): Program {
    const parsed = parse(raw);

    this.evaluate(parsed, machine);

    return parsed;
  }

  evaluate(program: Program, machine: Machine): void {
    for (const next of program) {
      switch (next.kind) {
        case 'instruction':
          this.lib[next.instruction](machine, this);
          break;
        case 'variable':
          // unbound names stay on the stack as they are, `let` relies on it
          machine.push(machine.lookup(next.name) ?? next);
          break;
        default:
          machine.push(next);
      }
    }
  }
}

export function evaluate(program: Program, machine: Machine, terminal?: Terminal): void {
  new Interpreter(terminal).evaluate(program, machine);
}

export function run(raw: string, machine = new Machine(), terminal?: Terminal): Machine {
  new Interpreter(terminal).eval(raw, machine);
  return machine;
}
