/**
 * Document source tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { findDocuments, readDocument, readDocuments, getDocumentExtension } from './reader.js';
import { ConfigurationError } from '../utils/errors.js';

describe('getDocumentExtension', () => {
  it('should map supported extensions and reject others', () => {
    expect(getDocumentExtension('guide.MD')).toBe('.md');
    expect(getDocumentExtension('manual.docx')).toBe('.docx');
    expect(getDocumentExtension('data.csv')).toBeNull();
    expect(getDocumentExtension('README')).toBeNull();
  });
});

describe('readDocuments', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `procflow-reader-test-${Date.now()}`);
    await mkdir(join(testDir, 'sub'), { recursive: true });
    await writeFile(join(testDir, 'b.txt'), 'Step one: open the ticket.');
    await writeFile(join(testDir, 'a.md'), '# Onboarding\n\n1. Create account');
    await writeFile(join(testDir, 'sub', 'c.txt'), 'Nested procedure');
    await writeFile(join(testDir, 'notes.csv'), 'a,b,c');
    await writeFile(join(testDir, 'broken.pdf'), 'not a real pdf');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should find supported files sorted by relative path', async () => {
    const files = await findDocuments(testDir);

    expect(files).toEqual([
      join(testDir, 'a.md'),
      join(testDir, 'b.txt'),
      join(testDir, 'broken.pdf'),
      join(testDir, 'sub', 'c.txt'),
    ]);
  });

  it('should stay in the top folder when not recursive', async () => {
    const files = await findDocuments(testDir, { recursive: false });

    expect(files).toEqual([join(testDir, 'a.md'), join(testDir, 'b.txt'), join(testDir, 'broken.pdf')]);
  });

  it('should read text documents and skip unreadable ones', async () => {
    const documents = await readDocuments(testDir);

    expect(documents.map((d) => d.relativePath)).toEqual(['a.md', 'b.txt', 'sub/c.txt']);
    expect(documents[1]).toEqual({
      content: 'Step one: open the ticket.',
      name: 'b.txt',
      path: join(testDir, 'b.txt'),
      relativePath: 'b.txt',
      extension: '.txt',
    });
    expect(documents[2].name).toBe('c.txt');
  });

  it('should raise ConfigurationError for a missing folder', async () => {
    await expect(readDocuments(join(testDir, 'nope'))).rejects.toThrow(ConfigurationError);
  });

  it('should raise ConfigurationError when the root is a file', async () => {
    await expect(findDocuments(join(testDir, 'b.txt'))).rejects.toThrow('Folder does not exist');
  });

  it('should refuse to read unsupported files directly', async () => {
    await expect(readDocument(join(testDir, 'notes.csv'), testDir)).rejects.toThrow(
      'Unsupported file type: .csv'
    );
  });
});
