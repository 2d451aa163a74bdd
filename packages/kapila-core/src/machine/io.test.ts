/**
 * I/O primitive tests - printing and whole-file reads and writes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { captureSession, faultOf } from './testing.js';

describe('print', () => {
  it('should print integers, floats and booleans', () => {
    const { session, output } = captureSession();
    session.pushInteger(5);
    session.pushInteger(3);
    session.invoke('add');
    session.invoke('print');
    session.pushFloat(2.5);
    session.invoke('print');
    session.pushBoolean(true);
    session.invoke('print');
    session.pushBoolean(false);
    session.invoke('print');

    expect(output()).toBe('82.5ಸರಿತಪ್ಪು');
    expect(session.depth).toBe(0);
  });

  it('should print nested lists element by element', () => {
    const { session, output } = captureSession();
    session.invoke('list-new');
    session.pushInteger(1);
    session.invoke('list-push');
    session.pushText('a');
    session.invoke('list-push');
    session.invoke('list-new');
    session.pushFloat(2.5);
    session.invoke('list-push');
    session.invoke('list-push');
    session.invoke('print');

    expect(output()).toBe('[1 a [2.5]]');
    expect(session.depth).toBe(0);
  });

  it('should print an empty list', () => {
    const { session, output } = captureSession();
    session.invoke('list-new');
    session.invoke('print');

    expect(output()).toBe('[]');
  });

  it('should stop at a list that contains itself', () => {
    const { session, output } = captureSession();
    session.invoke('list-new');
    session.invoke('dup');
    session.invoke('list-push');
    session.invoke('print');

    expect(output()).toBe('[[...]]');
  });

  it('should print lists within a one-slot stack', () => {
    const { session, output } = captureSession({ stackCapacity: 1 });
    session.invoke('list-new');
    session.peek().asList()?.list.append(session.peek());
    session.invoke('print');

    expect(output()).toBe('[[...]]');
  });

  it('should keep the value on the stack when it cannot be rendered', () => {
    const { session, output } = captureSession();
    session.pushText('a');
    session.pushText('b');
    session.invoke('concatenate');
    const stale = session.pop();
    session.init();

    session.pushInteger(1);
    session.push(stale);
    expect(faultOf(() => session.invoke('print'))?.kind).toBe('UseAfterRelease');
    expect(session.depth).toBe(2);

    session.invoke('drop');
    session.invoke('list-new');
    session.push(stale);
    session.invoke('list-push');
    expect(faultOf(() => session.invoke('println'))?.kind).toBe('UseAfterRelease');
    expect(session.depth).toBe(2);
    expect(output()).toBe('');
  });

  it('should print deeply nested lists', () => {
    const { session, output } = captureSession({ stackCapacity: 2 });
    const depth = 20000;
    session.invoke('list-new');
    for (let i = 0; i < depth; i++) {
      session.invoke('list-new');
      session.invoke('swap');
      session.invoke('list-push');
    }

    session.invoke('show-stack');
    const expected = '['.repeat(depth + 1) + ']'.repeat(depth + 1);
    expect(output()).toBe(`Stack: [${expected}]\n`);

    session.invoke('print');
    expect(output()).toBe(`Stack: [${expected}]\n${expected}`);
    expect(session.depth).toBe(0);
  });

  it('should end println with a newline', () => {
    const { session, output } = captureSession();
    session.pushText('ನಮಸ್ಕಾರ');
    session.invoke('println');

    expect(output()).toBe('ನಮಸ್ಕಾರ\n');
  });

  it('should fault when there is nothing to print', () => {
    const { session, output } = captureSession();

    expect(faultOf(() => session.invoke('print'))?.message).toBe('print: needs 1 values, stack holds 0');
    expect(output()).toBe('');
  });

  it('should show the stack bottom to top without changing it', () => {
    const { session, output } = captureSession();
    session.invoke('.s');
    session.pushInteger(1);
    session.pushText('x');
    session.invoke('show-stack');

    expect(output()).toBe('Stack: []\nStack: [1 x]\n');
    expect(session.depth).toBe(2);
  });
});

describe('File primitives', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kapila-io-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read a whole file into owned text', () => {
    const file = path.join(dir, 'input.txt');
    fs.writeFileSync(file, 'ಕನ್ನಡ\n');
    const { session } = captureSession();
    session.pushText(file);

    expect(session.invoke('read-file')).toEqual({ status: 'ok' });
    const text = session.pop().asText();
    expect(text?.toString()).toBe('ಕನ್ನಡ\n');
    expect(text?.ownership).toBe('owned');
    expect(text?.byteLength).toBe(16);
    expect(session.tracker.totalBytes).toBe(17);
  });

  it('should read an empty file', () => {
    const file = path.join(dir, 'empty.txt');
    fs.writeFileSync(file, '');
    const { session } = captureSession();
    session.pushText(file);
    session.invoke('ಓದು');

    expect(session.pop().asText()?.byteLength).toBe(0);
  });

  it('should push empty text for a missing file', () => {
    const missing = path.join(dir, 'missing.txt');
    const { session } = captureSession();
    session.pushText(missing);

    const outcome = session.invoke('read-file');
    expect(outcome).toEqual({ status: 'defaulted', reason: expect.stringContaining(`cannot open ${missing}:`) });
    expect(session.depth).toBe(1);
    expect(session.pop().asText()?.toString()).toBe('');
  });

  it('should reject a non-text path', () => {
    const { session } = captureSession();
    session.pushInteger(3);

    expect(session.invoke('read-file')).toEqual({ status: 'defaulted', reason: 'expects a path, got integer' });
  });

  it('should write text and report success', () => {
    const file = path.join(dir, 'output.txt');
    const { session } = captureSession();
    session.pushText(file);
    session.pushText('hello');
    session.invoke('write-file');

    expect(session.pop().asBoolean()?.value).toBe(true);
    expect(fs.readFileSync(file, 'utf8')).toBe('hello');
  });

  it('should write every byte, zero bytes included', () => {
    const file = path.join(dir, 'binary.dat');
    const { session } = captureSession();
    session.pushText(file);
    session.pushText('a\u0000b');
    session.invoke('ಬರೆ');
    session.invoke('drop');

    expect([...fs.readFileSync(file)]).toEqual([0x61, 0x00, 0x62]);

    session.pushText(file);
    session.invoke('read-file');
    expect(session.pop().asText()?.byteLength).toBe(3);
  });

  it('should report false when the file cannot be opened', () => {
    const file = path.join(dir, 'no', 'such', 'dir.txt');
    const { session } = captureSession();
    session.pushText(file);
    session.pushText('lost');

    const outcome = session.invoke('write-file');
    expect(outcome.status).toBe('defaulted');
    expect(session.pop().asBoolean()?.value).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('should reject a bad path under the strict policy', () => {
    const { session } = captureSession({ operandPolicy: 'strict' });
    session.pushBoolean(true);
    session.pushText('body');

    const fault = faultOf(() => session.invoke('write-file'));
    expect(fault?.kind).toBe('OperandRejected');
    expect(fault?.message).toBe('write-file: expects path and text, got boolean and text');
    expect(session.depth).toBe(2);
  });
});
