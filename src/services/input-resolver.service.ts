/**
 * Input Resolver Service
 *
 * Turns command-line file arguments into the list of topic documents to
 * convert, and decides where each document's artifacts go.
 */

import * as fs from 'fs';
import * as path from 'path';

import { glob } from 'glob';

export const TOPIC_EXTENSIONS = ['.yml', '.yaml'];

export interface ResolvedInputs {
  /** Existing documents, sorted and de-duplicated */
  files: string[];
  /** Plain paths that do not exist */
  missing: string[];
}

export interface ExpandOptions {
  cwd: string;
  /** Scanned recursively for .yml files when no patterns are given */
  defaultRoot: string;
}

function isPattern(value: string): boolean {
  return value.includes('*') || value.includes('?');
}

function isTopicFile(file: string): boolean {
  return TOPIC_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/**
 * Expand file arguments and glob patterns
 */
export async function expandInputs(patterns: string[], options: ExpandOptions): Promise<ResolvedInputs> {
  const files = new Set<string>();
  const missing: string[] = [];

  if (patterns.length === 0) {
    const matches = await glob('**/*.yml', { cwd: options.defaultRoot, absolute: true, nodir: true });
    matches.forEach(match => files.add(path.resolve(match)));
  }

  for (const pattern of patterns) {
    if (isPattern(pattern)) {
      const matches = await glob(pattern, { cwd: options.cwd, absolute: true, nodir: true });
      matches.filter(isTopicFile).forEach(match => files.add(path.resolve(match)));
      continue;
    }

    const file = path.resolve(options.cwd, pattern);
    if (fs.existsSync(file)) {
      files.add(file);
    } else {
      missing.push(file);
    }
  }

  // Sort for deterministic processing
  return { files: Array.from(files).sort(), missing };
}

/**
 * Output directory for a source file: the source's directory relative to
 * the content root, under the output directory. Sources outside the root
 * go straight into the output directory.
 */
export function resolveOutputDir(sourceFile: string, outputDir: string, contentRoot?: string): string {
  if (!contentRoot) {
    return outputDir;
  }
  const relative = path.relative(path.resolve(contentRoot), path.dirname(path.resolve(sourceFile)));
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return outputDir;
  }
  return path.join(outputDir, relative);
}

/**
 * Artifact path for a source file with a new extension
 */
export function outputPathFor(
  sourceFile: string,
  outputDir: string,
  extension: string,
  contentRoot?: string
): string {
  const stem = path.basename(sourceFile, path.extname(sourceFile));
  return path.join(resolveOutputDir(sourceFile, outputDir, contentRoot), `${stem}${extension}`);
}
