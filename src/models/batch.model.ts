/**
 * Batch Model
 *
 * Options and results of converting a set of topic documents.
 */

import { CommandRunner, CompileStatus } from '../typeset/latex-compiler';
import { Logger } from '../logging/console-logger';
import { PresentationFactory } from '../output/pptx-backend';
import { Theme } from '../theme/theme';

interface BatchOptionsBase {
  /** Files and glob patterns; empty means every .yml under contentRoot */
  inputs: string[];

  /** Base output directory */
  outputDir: string;

  /** Source sub-directories under this root are mirrored in the output */
  contentRoot: string;

  /** Directory patterns are resolved against (defaults to process.cwd()) */
  cwd?: string;

  logger?: Logger;
}

export interface PresentationBatchOptions extends BatchOptionsBase {
  theme?: Theme;

  /** Presentation factory (tests substitute a recording fake) */
  createPresentation?: PresentationFactory;
}

export interface TypesetBatchOptions extends BatchOptionsBase {
  templatePath: string;

  /** Run pdflatex on each generated .tex */
  compile: boolean;

  /** PDF output base directory; defaults to beside the .tex */
  pdfDir?: string;

  runner?: CommandRunner;
}

/**
 * Result of converting a single document
 */
export interface DocumentResult {
  /** Source file path */
  sourcePath: string;

  status: 'generated' | 'error';

  /** Written artifacts */
  outputs: string[];

  /** Error message if status is 'error' */
  error?: string;

  /** pdflatex outcome, typeset batches only */
  compile?: CompileStatus;

  /** Processing time in ms */
  processingTime: number;
}

export interface BatchResult {
  startedAt: string;
  completedAt: string;

  /** Documents attempted */
  totalFiles: number;

  /** Documents converted */
  processed: number;

  /** Documents that raised an error */
  failed: number;

  /** Plain paths given that do not exist */
  missing: string[];

  results: DocumentResult[];
}
