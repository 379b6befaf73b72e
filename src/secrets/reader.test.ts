import { fileURLToPath } from 'node:url';
import { pino } from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { readSecret } from './reader.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('readSecret', () => {
  const logger = pino({ level: 'silent' });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the string stored under the key', async () => {
    expect(await readSecret('weatherApiKey', { path: fixture('api-keys.plist'), logger })).toBe('test-secret');
    expect(await readSecret('mapsApiKey', { path: fixture('api-keys.plist'), logger })).toBe('test-maps-key');
  });

  it('returns null for an absent key without logging', async () => {
    const warn = vi.spyOn(logger, 'warn');

    expect(await readSecret('githubToken', { path: fixture('api-keys.plist'), logger })).toBeNull();
    expect(warn).not.toHaveBeenCalled();
  });

  it('returns null for a non-string value', async () => {
    expect(await readSecret('retryCount', { path: fixture('api-keys.plist'), logger })).toBeNull();
  });

  it('returns null and logs when the file is missing', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = fixture('does-not-exist.plist');

    await expect(readSecret('weatherApiKey', { path, logger })).resolves.toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({ err: expect.any(Error), path }, 'error reading secrets file');
  });

  it('returns null and logs when the file is not a property list', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = fixture('not-a-plist.txt');

    await expect(readSecret('weatherApiKey', { path, logger })).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(
      { err: expect.anything(), path },
      'error parsing secrets file as an XML property list',
    );
  });

  it('returns null and names the XML-only limit for a binary property list', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = fixture('binary.plist');

    await expect(readSecret('weatherApiKey', { path, logger })).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith(
      { path },
      'error secrets file is a binary property list, only XML property lists are supported',
    );
  });

  it('returns null and logs when the root is not a dictionary', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = fixture('array-root.plist');

    await expect(readSecret('weatherApiKey', { path, logger })).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith({ path }, 'error secrets file root is not a dictionary');
  });

  it('reads api-keys.plist from the working directory by default', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(fileURLToPath(new URL('./fixtures/', import.meta.url)));

    expect(await readSecret('weatherApiKey', { logger })).toBe('test-secret');
  });
});
