/**
 * LaTeX Compiler Tests
 *
 * pdflatex is replaced by a runner that writes the files it would produce.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Logger } from '../logging/console-logger';
import { CommandResult, CommandRunner, compileLatex } from './latex-compiler';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

const ok: CommandResult = { status: 0, stdout: '', stderr: '' };

/**
 * Runner that leaves a PDF and the auxiliary files beside the .tex
 */
function producingRunner(): jest.Mock<CommandResult, [string, string[], string]> {
  return jest.fn((_command: string, args: string[], cwd: string) => {
    const stem = path.basename(args[1], '.tex');
    for (const extension of ['.pdf', '.aux', '.log', '.nav']) {
      fs.writeFileSync(path.join(cwd, `${stem}${extension}`), extension);
    }
    return ok;
  });
}

describe('latex-compiler', () => {
  let tmpDir: string;
  let texPath: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'latex-compiler-'));
    texPath = path.join(tmpDir, 'intro.tex');
    fs.writeFileSync(texPath, '\\documentclass{beamer}');
    logger = createMockLogger();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should run pdflatex twice in the .tex directory', () => {
    const runner = producingRunner();

    compileLatex(texPath, { runner, logger });

    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner).toHaveBeenCalledWith('pdflatex', ['-interaction=nonstopmode', 'intro.tex'], tmpDir);
  });

  it('should keep the PDF beside the .tex and clean auxiliary files', () => {
    const result = compileLatex(texPath, { runner: producingRunner(), logger });

    expect(result).toEqual({ status: 'compiled', pdfPath: path.join(tmpDir, 'intro.pdf') });
    expect(fs.readdirSync(tmpDir).sort()).toEqual(['intro.pdf', 'intro.tex']);
  });

  it('should copy the PDF into the PDF directory, replacing an older one', () => {
    const pdfDir = path.join(tmpDir, 'pdfs', 'tema1');
    fs.mkdirSync(pdfDir, { recursive: true });
    fs.writeFileSync(path.join(pdfDir, 'intro.pdf'), 'old');

    const result = compileLatex(texPath, { runner: producingRunner(), pdfDir, logger });

    expect(result.status).toBe('compiled');
    expect(result.pdfPath).toBe(path.join(pdfDir, 'intro.pdf'));
    expect(fs.readFileSync(path.join(pdfDir, 'intro.pdf'), 'utf-8')).toBe('.pdf');
  });

  it('should stop after a failing first pass', () => {
    const runner = jest.fn<CommandResult, [string, string[], string]>(() => ({ status: 1, stdout: '', stderr: '' }));

    const result = compileLatex(texPath, { runner, logger });

    expect(runner).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ status: 'failed', message: 'No PDF was produced for intro.tex' });
  });

  it('should point at the log when no PDF was produced', () => {
    const runner: CommandRunner = (_command, _args, cwd) => {
      fs.writeFileSync(path.join(cwd, 'intro.log'), '! Undefined control sequence.');
      return { status: 1, stdout: '', stderr: '' };
    };

    const result = compileLatex(texPath, { runner, logger });

    expect(result.status).toBe('failed');
    expect(result.logPath).toBe(path.join(tmpDir, 'intro.log'));
  });

  it('should report a missing pdflatex as unavailable', () => {
    const error: NodeJS.ErrnoException = Object.assign(new Error('spawnSync pdflatex ENOENT'), { code: 'ENOENT' });
    const runner: CommandRunner = () => ({ status: null, stdout: '', stderr: '', error });

    const result = compileLatex(texPath, { runner, logger });

    expect(result.status).toBe('unavailable');
    expect(result.message).toBe(
      'pdflatex not found; install a LaTeX distribution (TeX Live, MiKTeX) to build PDFs'
    );
    expect(logger.warn).toHaveBeenCalledWith(result.message);
  });

  it('should report other spawn errors as failures', () => {
    const error: NodeJS.ErrnoException = Object.assign(new Error('spawnSync pdflatex EACCES'), { code: 'EACCES' });
    const runner: CommandRunner = () => ({ status: null, stdout: '', stderr: '', error });

    const result = compileLatex(texPath, { runner, logger });

    expect(result).toEqual({ status: 'failed', message: 'pdflatex could not run: spawnSync pdflatex EACCES' });
  });
});
