import { describe, expect, it } from "vitest";
import { num, stackEmpty, str } from "./ast";
import { Machine } from "./machine";

describe('Machine', () => {
  it('pops in last in first out order', () => {
    const machine = new Machine();

    machine.push(num(1));
    machine.push(num(2));

    expect(machine.peek()).toEqual(num(2));
    expect(machine.pop()).toEqual(num(2));
    expect(machine.pop()).toEqual(num(1));
  });

  it('yields the error value on an empty stack', () => {
    const machine = new Machine();

    expect(machine.pop()).toBe(stackEmpty);
    expect(machine.peek()).toBeUndefined();
    expect(machine.stack).toEqual([]);
  });

  it('overwrites bindings', () => {
    const machine = new Machine();

    machine.bind('x', num(1));
    machine.bind('x', str('one'));

    expect(machine.lookup('x')).toEqual(str('one'));
    expect(machine.lookup('y')).toBeUndefined();
  });

  it('resets stack and memory', () => {
    const machine = new Machine();

    machine.push(num(1));
    machine.bind('x', num(1));
    machine.reset();

    expect(machine.stack).toEqual([]);
    expect(machine.memory.size).toBe(0);
  });
});
