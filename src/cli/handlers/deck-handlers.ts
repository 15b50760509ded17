/**
 * Deck Command Handlers
 *
 * Business logic for the pptx and latex CLI commands.
 * Handlers accept services via dependency injection for testability.
 */

import * as path from 'path';

import { ConsoleLogger, defaultLogger, Logger } from '../../logging/console-logger';
import { BatchResult } from '../../models/batch.model';
import { ServiceContainer } from '../service-container';

/**
 * Options shared by both commands
 */
interface DeckCommandOptions {
  /** Files and glob patterns */
  files: string[];
  output: string;
  root: string;
  verbose: boolean;
}

export type PptxOptions = DeckCommandOptions;

export interface LatexOptions extends DeckCommandOptions {
  pdfDir: string;
  template: string;
  compile: boolean;
}

function commandLogger(verbose: boolean): Logger {
  return verbose ? new ConsoleLogger('topic-deck', 'debug') : defaultLogger;
}

/**
 * Print the outcome; true when the batch converted everything it found
 */
function reportBatch(result: BatchResult, artifact: string, container: ServiceContainer): boolean {
  if (result.totalFiles === 0) {
    container.console.error('\n✗ No topic files found');
    return false;
  }

  if (result.failed === 0) {
    container.console.log(`\n✓ Generated ${result.processed} ${artifact}(s)`);
    for (const doc of result.results) {
      container.console.log(`  - ${doc.outputs.join(', ')}`);
    }
    if (result.missing.length > 0) {
      container.console.log(`  Not found: ${result.missing.length}`);
    }
    return true;
  }

  container.console.error(`\n✗ ${result.failed} of ${result.totalFiles} document(s) failed:`);
  for (const doc of result.results.filter(r => r.status === 'error')) {
    container.console.error(`  - ${doc.sourcePath}: ${doc.error}`);
  }
  return false;
}

/**
 * Handle pptx command
 */
export async function handlePptx(options: PptxOptions, container: ServiceContainer): Promise<void> {
  const outputDir = path.resolve(options.output);
  const contentRoot = path.resolve(options.root);

  container.console.log('Topic Deck: PowerPoint');
  container.console.log('======================');
  container.console.log(`Output: ${outputDir}`);
  container.console.log(`Content root: ${contentRoot}`);
  container.console.log('');

  try {
    const result = await container.presentationPipeline.runPresentationBatch({
      inputs: options.files,
      outputDir,
      contentRoot,
      cwd: container.process.cwd(),
      logger: commandLogger(options.verbose),
    });

    if (!reportBatch(result, 'presentation', container)) {
      container.process.exit(1);
    }
  } catch (err) {
    container.console.error(`\n✗ Generation failed: ${err instanceof Error ? err.message : String(err)}`);
    container.process.exit(1);
  }
}

/**
 * Handle latex command
 */
export async function handleLatex(options: LatexOptions, container: ServiceContainer): Promise<void> {
  const outputDir = path.resolve(options.output);
  const contentRoot = path.resolve(options.root);
  const pdfDir = path.resolve(options.pdfDir);

  container.console.log('Topic Deck: LaTeX Beamer');
  container.console.log('========================');
  container.console.log(`Output: ${outputDir}`);
  container.console.log(`Content root: ${contentRoot}`);
  container.console.log(`Template: ${path.resolve(options.template)}`);
  container.console.log(`PDF: ${options.compile ? pdfDir : 'SKIPPED'}`);
  container.console.log('');

  try {
    const result = await container.typesetPipeline.runTypesetBatch({
      inputs: options.files,
      outputDir,
      contentRoot,
      cwd: container.process.cwd(),
      templatePath: options.template,
      compile: options.compile,
      pdfDir,
      logger: commandLogger(options.verbose),
    });

    const ok = reportBatch(result, 'LaTeX document', container);

    if (options.compile && result.results.length > 0) {
      const compiled = result.results.filter(r => r.compile === 'compiled').length;
      const unavailable = result.results.filter(r => r.compile === 'unavailable').length;
      const failed = result.results.filter(r => r.compile === 'failed').length;
      container.console.log(`  PDFs compiled: ${compiled}`);
      if (failed > 0) {
        container.console.log(`  PDF compilation failed: ${failed}`);
      }
      if (unavailable > 0) {
        container.console.log('  pdflatex not available; .tex files were kept');
      }
    }

    if (!ok) {
      container.process.exit(1);
    }
  } catch (err) {
    container.console.error(`\n✗ Generation failed: ${err instanceof Error ? err.message : String(err)}`);
    container.process.exit(1);
  }
}
