/**
 * Typeset Pipeline Service
 *
 * YAML topic documents → Beamer .tex (and optionally PDF):
 * 1. Load the template once
 * 2. Render each document through it
 * 3. Write the .tex under the mirrored output directory
 * 4. Compile with pdflatex when requested
 */

import * as path from 'path';

import { defaultLogger } from '../logging/console-logger';
import { BatchResult, TypesetBatchOptions } from '../models/batch.model';
import { writeTextOutput } from '../output/output-writer';
import { loadTopicDocument } from '../parsers/topic-parser';
import { compileLatex } from '../typeset/latex-compiler';
import { loadTypesetTemplate, renderTypeset, TypesetTemplate } from '../typeset/template-renderer';

import { DocumentOutcome, runBatch } from './batch.service';
import { expandInputs, outputPathFor, resolveOutputDir } from './input-resolver.service';

export const TEX_EXTENSION = '.tex';

/**
 * Render one document to .tex and compile it if asked
 */
export function convertToTypeset(
  sourcePath: string,
  template: TypesetTemplate,
  options: TypesetBatchOptions
): DocumentOutcome {
  const logger = options.logger ?? defaultLogger;
  const outputDir = path.resolve(options.outputDir);

  const latex = renderTypeset(loadTopicDocument(sourcePath), template, logger);
  const texPath = outputPathFor(sourcePath, outputDir, TEX_EXTENSION, options.contentRoot);
  writeTextOutput(latex, texPath);
  logger.info(`LaTeX generated: ${texPath}`);

  if (!options.compile) {
    return { outputs: [texPath] };
  }

  const pdfDir = options.pdfDir
    ? resolveOutputDir(sourcePath, path.resolve(options.pdfDir), options.contentRoot)
    : undefined;
  const compiled = compileLatex(texPath, { pdfDir, runner: options.runner, logger });

  return {
    outputs: compiled.pdfPath ? [texPath, compiled.pdfPath] : [texPath],
    compile: compiled.status,
  };
}

/**
 * Throws TemplateError before any document is touched if the template is missing
 */
export async function runTypesetBatch(options: TypesetBatchOptions): Promise<BatchResult> {
  const logger = options.logger ?? defaultLogger;
  const template = loadTypesetTemplate(options.templatePath);

  const { files, missing } = await expandInputs(options.inputs, {
    cwd: options.cwd ?? process.cwd(),
    defaultRoot: options.contentRoot,
  });

  logger.info(`Found ${files.length} topic file(s)`);

  return runBatch(files, missing, async file => convertToTypeset(file, template, options), logger);
}
