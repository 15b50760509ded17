#!/usr/bin/env node
/**
 * Topic Deck CLI
 *
 * Usage:
 *   topic-deck pptx                         # every .yml under ./clases
 *   topic-deck pptx clases/tema1/intro.yml -o ./out
 *   topic-deck latex 'clases/**' --no-compile
 */

import { Command } from 'commander';

import { DEFAULT_TEMPLATE_PATH } from '../typeset/template-renderer';

import { handleLatex, handlePptx } from './handlers/deck-handlers';
import { ServiceContainer } from './service-container';

interface PptxCommandOptions {
  output: string;
  root: string;
  verbose: boolean;
}

interface LatexCommandOptions extends PptxCommandOptions {
  pdfDir: string;
  template: string;
  compile: boolean;
}

export function createProgram(container: ServiceContainer = new ServiceContainer()): Command {
  const program = new Command();

  program
    .name('topic-deck')
    .description('Generate slide decks from YAML topic documents')
    .version('0.1.0');

  program
    .command('pptx')
    .description('Generate PowerPoint presentations')
    .argument('[files...]', 'Topic files or glob patterns (default: every .yml under the content root)')
    .option('-o, --output <dir>', 'Output directory', './pptx')
    .option('-r, --root <dir>', 'Content root mirrored in the output', './clases')
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (files: string[], options: PptxCommandOptions) => {
      await handlePptx({ files, ...options }, container);
    });

  program
    .command('latex')
    .description('Generate LaTeX Beamer sources and compile them to PDF')
    .argument('[files...]', 'Topic files or glob patterns (default: every .yml under the content root)')
    .option('-o, --output <dir>', 'Output directory for .tex files', './slides')
    .option('-p, --pdf-dir <dir>', 'Output directory for PDFs', './pdfs')
    .option('-t, --template <file>', 'Beamer template', DEFAULT_TEMPLATE_PATH)
    .option('-r, --root <dir>', 'Content root mirrored in the output', './clases')
    .option('--no-compile', 'Only generate .tex files')
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (files: string[], options: LatexCommandOptions) => {
      await handleLatex({ files, ...options }, container);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
