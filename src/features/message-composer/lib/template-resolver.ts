/**
 * Template resolution
 *
 * Precedence: template file (present and non-blank) > configured override >
 * built-in default.
 */

import { readFile } from 'fs/promises';
import { createLogger } from '../../../shared/lib';
import type { ResolvedTemplate, TemplateSources } from '../model';
import { decodeText } from './text-decoder';

const log = createLogger('Template');

function isBlank(text: string | undefined): boolean {
  return !text || text.trim() === '';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the template file, returning null when it cannot be read
 */
async function readTemplateFile(filePath: string): Promise<string | null> {
  try {
    const bytes = await readFile(filePath);
    return decodeText(bytes);
  } catch (error) {
    if (isNotFound(error)) {
      log.debug(`No template file at ${filePath}`);
    } else {
      log.warn(`Could not read template file ${filePath}, using fallback: ${error}`);
    }
    return null;
  }
}

/**
 * Resolve the message template for this run
 */
export async function resolveTemplate(sources: TemplateSources): Promise<ResolvedTemplate> {
  const fileText = await readTemplateFile(sources.filePath);
  if (fileText !== null && !isBlank(fileText)) {
    return { text: fileText, source: 'file' };
  }

  if (sources.configOverride !== undefined && !isBlank(sources.configOverride)) {
    return { text: sources.configOverride, source: 'config' };
  }

  return { text: sources.builtinDefault, source: 'default' };
}
