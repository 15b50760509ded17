/**
 * LaTeX compiler
 *
 * Runs pdflatex twice (cross references need the second pass), copies the
 * PDF to its destination and removes the auxiliary files on success.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';

import { defaultLogger, Logger } from '../logging/console-logger';

export const LATEX_COMMAND = 'pdflatex';

/** Extensions of the files pdflatex leaves next to the .tex */
export const AUXILIARY_EXTENSIONS = ['.aux', '.log', '.out', '.nav', '.snm', '.toc'];

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the command could not be started */
  error?: NodeJS.ErrnoException;
}

export type CommandRunner = (command: string, args: string[], cwd: string) => CommandResult;

export const spawnCommand: CommandRunner = (command, args, cwd) => {
  const result = spawnSync(command, args, { cwd, encoding: 'utf-8' });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error,
  };
};

export type CompileStatus = 'compiled' | 'failed' | 'unavailable';

export interface CompileResult {
  status: CompileStatus;
  /** Final location of the PDF when compiled */
  pdfPath?: string;
  /** pdflatex log to inspect when the PDF was not produced */
  logPath?: string;
  message?: string;
}

export interface CompileOptions {
  /** Directory the PDF is copied to; defaults to the .tex directory */
  pdfDir?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

function removeAuxiliaryFiles(workDir: string, stem: string, logger: Logger): void {
  for (const extension of AUXILIARY_EXTENSIONS) {
    const auxFile = path.join(workDir, `${stem}${extension}`);
    if (!fs.existsSync(auxFile)) continue;
    try {
      fs.unlinkSync(auxFile);
    } catch (err) {
      logger.warn(`Could not remove ${auxFile}`, { error: String(err) });
    }
  }
}

function copyPdf(generated: string, pdfDir: string): string {
  fs.mkdirSync(pdfDir, { recursive: true });
  const destination = path.join(pdfDir, path.basename(generated));
  if (path.resolve(destination) === path.resolve(generated)) {
    return generated;
  }
  if (fs.existsSync(destination)) {
    fs.unlinkSync(destination);
  }
  fs.copyFileSync(generated, destination);
  return destination;
}

/**
 * Compile a .tex file into a PDF
 */
export function compileLatex(texPath: string, options: CompileOptions = {}): CompileResult {
  const runner = options.runner ?? spawnCommand;
  const logger = options.logger ?? defaultLogger;

  const texFile = path.resolve(texPath);
  const workDir = path.dirname(texFile);
  const stem = path.basename(texFile, path.extname(texFile));
  const args = ['-interaction=nonstopmode', path.basename(texFile)];

  for (let pass = 0; pass < 2; pass++) {
    const result = runner(LATEX_COMMAND, args, workDir);

    if (result.error) {
      if (result.error.code === 'ENOENT') {
        const message = `${LATEX_COMMAND} not found; install a LaTeX distribution (TeX Live, MiKTeX) to build PDFs`;
        logger.warn(message);
        return { status: 'unavailable', message };
      }
      const message = `${LATEX_COMMAND} could not run: ${result.error.message}`;
      logger.error(message, result.error);
      return { status: 'failed', message };
    }

    if (pass === 0 && result.status !== 0) {
      logger.warn(`First ${LATEX_COMMAND} pass failed for ${path.basename(texFile)}`);
      break;
    }
  }

  const generated = path.join(workDir, `${stem}.pdf`);

  if (!fs.existsSync(generated)) {
    const logPath = path.join(workDir, `${stem}.log`);
    const message = `No PDF was produced for ${path.basename(texFile)}`;
    logger.warn(message, fs.existsSync(logPath) ? { log: logPath } : undefined);
    return {
      status: 'failed',
      message,
      ...(fs.existsSync(logPath) ? { logPath } : {}),
    };
  }

  const pdfPath = options.pdfDir ? copyPdf(generated, options.pdfDir) : generated;
  removeAuxiliaryFiles(workDir, stem, logger);
  logger.info(`PDF generated: ${pdfPath}`);

  return { status: 'compiled', pdfPath };
}
