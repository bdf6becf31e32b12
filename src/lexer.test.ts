import { describe, expect, it } from "vitest";
import { tokenize } from "./lexer";

describe('tokenize', () => {
  it('splits on whitespace', () => {
    expect(tokenize('3 4 add')).toEqual(['3', '4', 'add']);
    expect(tokenize('  1\t2\n3\r\n4　5  ')).toEqual(['1', '2', '3', '4', '5']);
  });

  it('keeps a block with nested blocks as one token', () => {
    expect(tokenize('{1 {2 3} add} eval')).toEqual(['{1 {2 3} add}', 'eval']);
    expect(tokenize('{ {{}} }')).toEqual(['{ {{}} }']);
  });

  it('keeps whitespace inside quotes', () => {
    expect(tokenize('"hello  world" print')).toEqual(['"hello  world"', 'print']);
  });

  it('treats braces inside a top level quote as text', () => {
    expect(tokenize('"a{b" 1')).toEqual(['"a{b"', '1']);
  });

  it('treats quotes inside a block as text', () => {
    expect(tokenize('{"}" } x')).toEqual(['{"}', 'x']);
    expect(tokenize('{"a b" print}')).toEqual(['{"a b" print}']);
  });

  it('ends a block or a string token at its closing delimiter', () => {
    expect(tokenize('{a}b')).toEqual(['{a}', 'b']);
    expect(tokenize('"a"b')).toEqual(['"a"', 'b']);
    expect(tokenize('a{b}')).toEqual(['a{b}']);
  });

  it('ignores a stray closing brace', () => {
    expect(tokenize('1 } 2')).toEqual(['1', '2']);
  });

  it('drops an unterminated block or string', () => {
    expect(tokenize('1 {2 3')).toEqual(['1']);
    expect(tokenize('1 "abc')).toEqual(['1']);
    expect(tokenize('1 {2 {3}')).toEqual(['1']);
  });

  it('returns nothing for blank input', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize(' \n\t')).toEqual([]);
  });
});
