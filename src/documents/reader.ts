/**
 * Document source
 * Finds supported documents under a folder and reads their text
 */

import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, join, relative, resolve, sep } from 'path';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { extractFromBinary } from './binary.js';

/**
 * File extensions the reader understands
 */
export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.pdf', '.docx'] as const;

export type DocumentExtension = (typeof SUPPORTED_EXTENSIONS)[number];

/**
 * One document ready for extraction
 */
export interface DocumentInput {
  content: string;
  /** File name */
  name: string;
  /** Absolute path */
  path: string;
  /** Path below the root folder, '/'-separated */
  relativePath: string;
  extension: DocumentExtension;
}

/**
 * Document discovery options
 */
export interface ReadDocumentsOptions {
  /** Search subfolders (default: true) */
  recursive?: boolean;
}

const log = () => createLogger({ module: 'documents' });

/**
 * Get the supported extension of a file, if any
 */
export function getDocumentExtension(filePath: string): DocumentExtension | null {
  const ext = extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.find((supported) => supported === ext) ?? null;
}

function toRelativePath(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join('/');
}

/**
 * Find supported documents under a folder, sorted by relative path
 * @throws ConfigurationError if the folder does not exist
 */
export async function findDocuments(root: string, options: ReadDocumentsOptions = {}): Promise<string[]> {
  const rootDir = resolve(root);
  const recursive = options.recursive ?? true;

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(rootDir)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Folder does not exist: ${root}`);
  }

  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    const entries = await readdir(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);

      if (entry.isFile() && getDocumentExtension(entry.name)) {
        files.push(fullPath);
      } else if (entry.isDirectory() && recursive) {
        await walk(fullPath);
      }
    }
  }

  await walk(rootDir);

  const sorted = files
    .map((path) => ({ path, relativePath: toRelativePath(rootDir, path) }))
    .sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0))
    .map((file) => file.path);

  log().info({ root: rootDir, count: sorted.length }, 'Found documents');
  return sorted;
}

/**
 * Read one document
 * @throws Error if the file cannot be read or has an unsupported type
 */
export async function readDocument(filePath: string, root: string): Promise<DocumentInput> {
  const path = resolve(filePath);
  const extension = getDocumentExtension(path);
  if (!extension) {
    throw new Error(`Unsupported file type: ${extname(path)}`);
  }

  let content: string;
  if (extension === '.txt' || extension === '.md') {
    content = await readFile(path, 'utf-8');
  } else {
    const result = await extractFromBinary(path);
    if (!result.success) {
      throw new Error(result.error ?? `Unable to extract text from ${basename(path)}`);
    }
    content = result.content;
  }

  return {
    content,
    name: basename(path),
    path,
    relativePath: toRelativePath(resolve(root), path),
    extension,
  };
}

/**
 * Read every supported document under a folder
 * Files that cannot be read are logged and skipped
 */
export async function readDocuments(root: string, options: ReadDocumentsOptions = {}): Promise<DocumentInput[]> {
  const logger = log();
  const documents: DocumentInput[] = [];

  for (const filePath of await findDocuments(root, options)) {
    try {
      const document = await readDocument(filePath, root);
      documents.push(document);
      logger.debug({ document: document.relativePath, length: document.content.length }, 'Read document');
    } catch (err) {
      logger.error(
        { path: filePath, error: err instanceof Error ? err.message : String(err) },
        'Failed to read document, skipping'
      );
    }
  }

  return documents;
}
