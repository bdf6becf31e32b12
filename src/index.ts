export * from "./ast";
export { tokenize } from "./lexer";
export { parse } from "./parser";
export { Machine } from "./machine";
export { Interpreter, evaluate, run } from "./interpreter";
export { initCoreLib } from "./lib";
export type { CoreLib, Operation, Runtime } from "./lib";
export { BufferTerminal, ProcessTerminal } from "./terminal";
export type { Terminal } from "./terminal";
export { Context } from "./context";
export { formatNumber, parseNumber } from "./util";
