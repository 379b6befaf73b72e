import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import plist from 'plist';
import { createLogger, type Logger } from '../utils/logger.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** Property-list file read when no path is given, relative to the working directory. */
export const DEFAULT_SECRETS_PATH = 'api-keys.plist';

/** Options for {@link readSecret}. */
export interface ReadSecretOptions {
  /**
   * Path to the property-list file.
   * @default 'api-keys.plist'
   */
  path?: string;
  /** Logger receiving read and parse failures. */
  logger?: Logger;
}

/** Header of binary property lists, which the XML parser cannot read. */
const BINARY_PLIST_MAGIC = 'bplist';

function isDictionary(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Looks up a string by key in a local XML property-list file whose root is a dictionary.
 * Only the XML format is read; a binary property list (`bplist00` header) resolves to `null`.
 *
 * Resolves to `null` when the file is missing or unreadable, is binary or otherwise not an XML property list,
 * has no dictionary root, lacks the key, or stores a non-string value under it. Never rejects; read and parse
 * failures are logged at `warn`.
 */
export async function readSecret(name: string, opts: ReadSecretOptions = {}): Promise<string | null> {
  const path = resolve(opts.path ?? DEFAULT_SECRETS_PATH);
  const logger = opts.logger ?? createLogger();

  const [errRead, contents] = await safeWrapAsync(() => readFile(path, 'utf8'));
  if (errRead) {
    logger.warn({ err: errRead, path }, 'error reading secrets file');
    return null;
  }

  if (contents.startsWith(BINARY_PLIST_MAGIC)) {
    logger.warn({ path }, 'error secrets file is a binary property list, only XML property lists are supported');
    return null;
  }

  const [errParse, parsed] = safeWrap<Error, unknown>(() => plist.parse(contents));
  if (errParse) {
    logger.warn({ err: errParse, path }, 'error parsing secrets file as an XML property list');
    return null;
  }

  if (!isDictionary(parsed)) {
    logger.warn({ path }, 'error secrets file root is not a dictionary');
    return null;
  }

  const value = parsed[name];
  return typeof value === 'string' ? value : null;
}
