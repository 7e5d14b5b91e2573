/**
 * Binary document extraction
 * Pulls plain text out of PDF and DOCX files
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';

/**
 * Binary extraction result
 */
export interface BinaryExtractionResult {
  content: string;
  pageCount?: number;
  fileType: 'pdf' | 'docx' | 'unknown';
  success: boolean;
  error?: string;
}

/**
 * Check if file is a PDF
 */
export function isPdfFile(filePath: string): boolean {
  return extname(filePath).toLowerCase() === '.pdf';
}

/**
 * Check if file is a DOCX
 */
export function isDocxFile(filePath: string): boolean {
  return extname(filePath).toLowerCase() === '.docx';
}

function failure(fileType: BinaryExtractionResult['fileType'], err: unknown): BinaryExtractionResult {
  return {
    content: '',
    fileType,
    success: false,
    error: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Extract text from PDF file
 */
export async function extractFromPdf(filePath: string): Promise<BinaryExtractionResult> {
  try {
    // The package root runs a self-test on import; load the parser directly
    const { default: pdfParse } = await import('pdf-parse/lib/pdf-parse.js');
    const buffer = await readFile(filePath);

    const data = await pdfParse(buffer);

    return {
      content: data.text,
      pageCount: data.numpages,
      fileType: 'pdf',
      success: true,
    };
  } catch (err) {
    return failure('pdf', err);
  }
}

/**
 * Extract text from DOCX file, one paragraph per line
 */
export async function extractFromDocx(filePath: string): Promise<BinaryExtractionResult> {
  try {
    const { default: mammoth } = await import('mammoth');
    const buffer = await readFile(filePath);

    const result = await mammoth.extractRawText({ buffer });

    return {
      content: result.value,
      fileType: 'docx',
      success: true,
    };
  } catch (err) {
    return failure('docx', err);
  }
}

/**
 * Extract text from any supported binary file
 */
export async function extractFromBinary(filePath: string): Promise<BinaryExtractionResult> {
  if (isPdfFile(filePath)) {
    return extractFromPdf(filePath);
  }

  if (isDocxFile(filePath)) {
    return extractFromDocx(filePath);
  }

  return {
    content: '',
    fileType: 'unknown',
    success: false,
    error: `Unsupported file type: ${extname(filePath)}`,
  };
}
