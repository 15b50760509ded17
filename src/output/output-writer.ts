/**
 * Output Writer
 *
 * Writes a rendered artifact to its destination, creating missing parent
 * directories. Failures surface as OutputWriteError; nothing is retried.
 */

import * as fs from 'fs';
import * as path from 'path';

import { OutputWriteError, toError } from '../errors';

function writeArtifact(destination: string, data: string | Uint8Array, encoding?: BufferEncoding): void {
  const parent = path.dirname(destination);
  try {
    fs.mkdirSync(parent, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(`Cannot create output directory ${parent}`, destination, toError(err));
  }

  try {
    if (encoding) {
      fs.writeFileSync(destination, data, encoding);
    } else {
      fs.writeFileSync(destination, data);
    }
  } catch (err) {
    throw new OutputWriteError(`Cannot write ${destination}`, destination, toError(err));
  }
}

export function writeTextOutput(text: string, destination: string): void {
  writeArtifact(destination, text, 'utf-8');
}

export function writeBinaryOutput(data: Uint8Array, destination: string): void {
  writeArtifact(destination, data);
}
