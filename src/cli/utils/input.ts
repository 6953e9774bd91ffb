// Reading command input files

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { NotFoundError, ValidationError } from '../../core/errors.js';

/**
 * Read a YAML or JSON document. JSON is read by the YAML parser too.
 */
export async function readStructuredFile(file: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError('File', file);
    }
    throw error;
  }

  try {
    return yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot parse ${file}: ${reason}`, 'file');
  }
}
