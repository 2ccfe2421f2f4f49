import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { decodeText, resolveTemplate } from '../../src/features/message-composer';

/** 配信あい in Shift_JIS */
const SHIFT_JIS_BYTES = Uint8Array.from([0x94, 0x7a, 0x90, 0x4d, 0x82, 0xa0, 0x82, 0xa2]);

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(new TextEncoder().encode('配信開始 {url}'))).toBe('配信開始 {url}');
  });

  it('strips a UTF-8 byte order mark', () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, ...new TextEncoder().encode('{url}')]);

    expect(decodeText(bytes)).toBe('{url}');
  });

  it('falls back to Shift_JIS when the bytes are not UTF-8', () => {
    expect(decodeText(SHIFT_JIS_BYTES)).toBe('配信あい');
  });

  it('tries encodings in the given order', () => {
    // 配信 in EUC-JP
    const eucJp = Uint8Array.from([0xc7, 0xdb, 0xbf, 0xae]);

    expect(decodeText(eucJp, ['utf-8', 'euc-jp'])).toBe('配信');
  });

  it('skips encodings the runtime does not know', () => {
    expect(decodeText(SHIFT_JIS_BYTES, ['no-such-encoding', 'shift_jis'])).toBe('配信あい');
  });

  it('decodes lossily when every encoding rejects the bytes', () => {
    expect(decodeText(Uint8Array.from([0x41, 0xff, 0x42]), ['utf-8'])).toBe('A\uFFFDB');
  });
});

describe('resolveTemplate', () => {
  let tempDir: string;
  const builtinDefault = 'default {url}';

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'template-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('prefers the template file', async () => {
    const filePath = join(tempDir, 'template.txt');
    await writeFile(filePath, 'from file {title}', 'utf-8');

    const template = await resolveTemplate({
      filePath,
      configOverride: 'from config {url}',
      builtinDefault,
    });

    expect(template).toEqual({ text: 'from file {title}', source: 'file' });
  });

  it('reads a Shift_JIS template file', async () => {
    const filePath = join(tempDir, 'massage.txt');
    await writeFile(filePath, SHIFT_JIS_BYTES);

    const template = await resolveTemplate({ filePath, builtinDefault });

    expect(template).toEqual({ text: '配信あい', source: 'file' });
  });

  it('uses the configured override when the file is missing', async () => {
    const template = await resolveTemplate({
      filePath: join(tempDir, 'missing.txt'),
      configOverride: 'from config {url}',
      builtinDefault,
    });

    expect(template).toEqual({ text: 'from config {url}', source: 'config' });
  });

  it('uses the configured override when the file is blank', async () => {
    const filePath = join(tempDir, 'template.txt');
    await writeFile(filePath, ' \n\t\n', 'utf-8');

    const template = await resolveTemplate({
      filePath,
      configOverride: 'from config {url}',
      builtinDefault,
    });

    expect(template.source).toBe('config');
  });

  it('uses the built-in default when nothing else is set', async () => {
    const template = await resolveTemplate({
      filePath: join(tempDir, 'missing.txt'),
      builtinDefault,
    });

    expect(template).toEqual({ text: builtinDefault, source: 'default' });
  });

  it('ignores a blank override', async () => {
    const template = await resolveTemplate({
      filePath: join(tempDir, 'missing.txt'),
      configOverride: '   ',
      builtinDefault,
    });

    expect(template.source).toBe('default');
  });

  it('falls through when the path cannot be read as a file', async () => {
    const dirPath = join(tempDir, 'template.txt');
    await mkdir(dirPath);

    const template = await resolveTemplate({ filePath: dirPath, builtinDefault });

    expect(template.source).toBe('default');
  });
});
