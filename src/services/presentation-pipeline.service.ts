/**
 * Presentation Pipeline Service
 *
 * YAML topic documents → .pptx files:
 * 1. Resolve the input files
 * 2. Decode each document into a Topic
 * 3. Assemble the Deck
 * 4. Write the presentation under the mirrored output directory
 */

import * as path from 'path';

import { assembleDeck } from '../builders/deck-assembler';
import { defaultLogger } from '../logging/console-logger';
import { BatchResult, PresentationBatchOptions } from '../models/batch.model';
import { writePresentation } from '../output/pptx-backend';
import { loadTopicFile } from '../parsers/topic-parser';

import { runBatch } from './batch.service';
import { expandInputs, outputPathFor } from './input-resolver.service';

export const PPTX_EXTENSION = '.pptx';

/**
 * Convert one topic document into a presentation, returning its path
 */
export async function convertToPresentation(
  sourcePath: string,
  options: PresentationBatchOptions
): Promise<string> {
  const logger = options.logger ?? defaultLogger;
  const topic = loadTopicFile(sourcePath, logger);
  const deck = assembleDeck(topic, { theme: options.theme, logger });
  const destination = outputPathFor(sourcePath, path.resolve(options.outputDir), PPTX_EXTENSION, options.contentRoot);

  await writePresentation(deck, destination, options.createPresentation);
  logger.info(`Presentation generated: ${destination}`, { slides: deck.slides.length });

  return destination;
}

export async function runPresentationBatch(options: PresentationBatchOptions): Promise<BatchResult> {
  const logger = options.logger ?? defaultLogger;
  const { files, missing } = await expandInputs(options.inputs, {
    cwd: options.cwd ?? process.cwd(),
    defaultRoot: options.contentRoot,
  });

  logger.info(`Found ${files.length} topic file(s)`);

  return runBatch(
    files,
    missing,
    async file => ({ outputs: [await convertToPresentation(file, options)] }),
    logger
  );
}
