/**
 * Output Writer Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { OutputWriteError } from '../errors';
import { writeBinaryOutput, writeTextOutput } from './output-writer';

describe('output-writer', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'output-writer-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should create missing parent directories', () => {
    const destination = path.join(tmpDir, 'a', 'b', 'tema.tex');

    writeTextOutput('\\begin{document}', destination);

    expect(fs.readFileSync(destination, 'utf-8')).toBe('\\begin{document}');
  });

  it('should write binary data unchanged', () => {
    const destination = path.join(tmpDir, 'deck.pptx');

    writeBinaryOutput(new Uint8Array([0x50, 0x4b, 0x03, 0x04]), destination);

    expect([...fs.readFileSync(destination)]).toEqual([0x50, 0x4b, 0x03, 0x04]);
  });

  it('should replace an existing file', () => {
    const destination = path.join(tmpDir, 'tema.tex');
    fs.writeFileSync(destination, 'old');

    writeTextOutput('new', destination);

    expect(fs.readFileSync(destination, 'utf-8')).toBe('new');
  });

  it('should wrap a directory that cannot be created', () => {
    const blocker = path.join(tmpDir, 'file');
    fs.writeFileSync(blocker, '');
    const destination = path.join(blocker, 'sub', 'tema.tex');

    const write = () => writeTextOutput('x', destination);

    expect(write).toThrow(OutputWriteError);
    expect(write).toThrow(`Cannot create output directory ${path.join(blocker, 'sub')}`);
  });

  it('should wrap a destination that cannot be written', () => {
    const destination = path.join(tmpDir, 'taken');
    fs.mkdirSync(destination);

    let caught: unknown;
    try {
      writeTextOutput('x', destination);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(OutputWriteError);
    expect(caught).toMatchObject({ message: `Cannot write ${destination}`, destination });
    expect(caught).toHaveProperty('cause');
  });
});
