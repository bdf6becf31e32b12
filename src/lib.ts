import { asBlock, asBool, asNumber, asString, bool, type Instruction, num, type Program, str, type Value } from "./ast";
import type { Machine } from "./machine";
import type { Terminal } from "./terminal";

/**
 * What an instruction gets to work with. `evaluate` re-enters the
 * interpreter against the same machine, so blocks share its stack and memory.
 */
export interface Runtime {
  terminal: Terminal;
  evaluate(program: Program, machine: Machine): void;
}

export type Operation = (machine: Machine, runtime: Runtime) => void;

export type CoreLib = { readonly [key in Instruction]: Operation };

// The right operand is on top, so it comes off first.
function binary<Operand>(coerce: (value: Value) => Operand, op: (left: Operand, right: Operand) => Value): Operation {
  return machine => {
    const right = coerce(machine.pop());
    const left = coerce(machine.pop());
    machine.push(op(left, right));
  };
}

function arithmetic(op: (left: number, right: number) => number): Operation {
  return binary(asNumber, (left, right) => num(op(left, right)));
}

function loop(expected: boolean): Operation {
  return (machine, runtime) => {
    const body = asBlock(machine.pop());
    const condition = asBlock(machine.pop());

    while (true) {
      runtime.evaluate(condition, machine);

      if (asBool(machine.pop()) !== expected) {
        return;
      }

      runtime.evaluate(body, machine);
    }
  };
}

export function initCoreLib(): CoreLib {
  return {
    add: arithmetic((left, right) => left + right),
    sub: arithmetic((left, right) => left - right),
    mul: arithmetic((left, right) => left * right),
    div: arithmetic((left, right) => left / right),
    mod: arithmetic((left, right) => left % right),
    pow: arithmetic((left, right) => left ** right),
    concat: binary(asString, (left, right) => str(left + right)),
    print: (machine, { terminal }) => {
      terminal.write(asString(machine.pop()));
    },
    input: (machine, { terminal }) => {
      machine.push(str(terminal.readLine() ?? ''));
    },
    equal: binary(asString, (left, right) => bool(left === right)),
    'less-than': binary(asNumber, (left, right) => bool(left < right)),
    'greater-than': binary(asNumber, (left, right) => bool(left > right)),
    eval: (machine, runtime) => {
      runtime.evaluate(asBlock(machine.pop()), machine);
    },
    when: (machine, runtime) => {
      const code = asBlock(machine.pop());
      const condition = asBool(machine.pop());

      if (condition) {
        runtime.evaluate(code, machine);
      }
    },
    'if-else': (machine, runtime) => {
      const codeFalse = asBlock(machine.pop());
      const codeTrue = asBlock(machine.pop());
      const condition = asBool(machine.pop());

      runtime.evaluate(condition ? codeTrue : codeFalse, machine);
    },
    while: loop(true),
    until: loop(false),
    let: machine => {
      const name = asString(machine.pop());
      const value = machine.pop();
      machine.bind(name, value);
    },
    pop: machine => {
      machine.stack.pop();
    },
  };
}
