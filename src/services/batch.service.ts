/**
 * Batch Service
 *
 * Converts documents one after another. A document that throws is logged
 * and recorded as an error; the remaining documents still run.
 */

import { BatchResult, DocumentResult } from '../models/batch.model';
import { Logger } from '../logging/console-logger';

export interface DocumentOutcome {
  outputs: string[];
  compile?: DocumentResult['compile'];
}

export type DocumentConverter = (sourcePath: string) => Promise<DocumentOutcome>;

export async function runBatch(
  files: readonly string[],
  missing: readonly string[],
  convert: DocumentConverter,
  logger: Logger
): Promise<BatchResult> {
  const startTime = new Date();
  const results: DocumentResult[] = [];

  for (const file of missing) {
    logger.warn(`Not found: ${file}`);
  }

  for (const file of files) {
    const fileStartTime = Date.now();
    logger.info(`Processing ${file}`);
    try {
      const outcome = await convert(file);
      results.push({
        sourcePath: file,
        status: 'generated',
        outputs: outcome.outputs,
        ...(outcome.compile ? { compile: outcome.compile } : {}),
        processingTime: Date.now() - fileStartTime,
      });
    } catch (err) {
      const errorMsg = `Error processing ${file}: ${err instanceof Error ? err.message : String(err)}`;
      logger.error(errorMsg, err);
      results.push({
        sourcePath: file,
        status: 'error',
        outputs: [],
        error: errorMsg,
        processingTime: Date.now() - fileStartTime,
      });
    }
  }

  const processed = results.filter(r => r.status === 'generated').length;
  const failed = results.filter(r => r.status === 'error').length;

  return {
    startedAt: startTime.toISOString(),
    completedAt: new Date().toISOString(),
    totalFiles: files.length,
    processed,
    failed,
    missing: [...missing],
    results,
  };
}
