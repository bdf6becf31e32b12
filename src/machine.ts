import { stackEmpty, type Value } from "./ast";

/**
 * Runtime state of one interpreter: the operand stack and the global memory.
 * There are no scopes, every binding lives in the same map.
 */
export class Machine {

  readonly stack: Value[] = [];
  readonly memory = new Map<string, Value>();

  push(value: Value): void {
    this.stack.push(value);
  }

  /**
   * Popping an empty stack is not a failure, it yields the StackEmpty error value.
   */
  pop(): Value {
    return this.stack.pop() ?? stackEmpty;
  }

  peek(): Value | undefined {
    return this.stack[this.stack.length - 1];
  }

  lookup(name: string): Value | undefined {
    return this.memory.get(name);
  }

  bind(name: string, value: Value): void {
    this.memory.set(name, value);
  }

  reset(): void {
    this.stack.length = 0;
    this.memory.clear();
  }
}
