import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from "vitest";
import { BufferTerminal, ProcessTerminal } from "./terminal";

describe('BufferTerminal', () => {
  it('collects output and serves queued lines', () => {
    const terminal = new BufferTerminal(['first']);

    terminal.write('a');
    terminal.write('b');
    terminal.feed('second');

    expect(terminal.output).toBe('ab');
    expect(terminal.readLine()).toBe('first');
    expect(terminal.readLine()).toBe('second');
    expect(terminal.readLine()).toBeNull();
  });
});

describe('ProcessTerminal', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function openWith(content: string): number {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackpp-'));
    dirs.push(dir);

    const file = path.join(dir, 'input.txt');
    fs.writeFileSync(file, content);

    return fs.openSync(file, 'r');
  }

  it('reads one line at a time from a descriptor', () => {
    const fd = openWith('abc\r\nxyz\n\nlast');
    const terminal = new ProcessTerminal(fd);

    try {
      expect(terminal.readLine()).toBe('abc');
      expect(terminal.readLine()).toBe('xyz');
      expect(terminal.readLine()).toBe('');
      expect(terminal.readLine()).toBe('last');
      expect(terminal.readLine()).toBeNull();
    } finally {
      fs.closeSync(fd);
    }
  });

  it('decodes multibyte characters', () => {
    const fd = openWith('スタック\n');

    try {
      expect(new ProcessTerminal(fd).readLine()).toBe('スタック');
    } finally {
      fs.closeSync(fd);
    }
  });
});
