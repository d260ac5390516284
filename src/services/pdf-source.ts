/**
 * PDF directory source.
 *
 * Reads every `*.pdf` file from the materials and assignments directories,
 * extracts its text with pdf-parse and hands the result to the knowledge base.
 * Files are visited in name order so ingestion order is reproducible.
 *
 * A PDF that cannot be parsed is reported as an IngestionError and the scan
 * moves on; a missing directory is logged and contributes no documents.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { PDFParse } from 'pdf-parse';
import type { DocumentClass, DocumentInput } from '../types/index.js';
import { IngestionError } from '../utils/errors.js';
import type { DocumentSource, SourceLoadResult } from './knowledge-base.js';

export interface PdfDirectories {
  materialsDir: string;
  assignmentsDir: string;
}

/**
 * Tidy raw extractor output while keeping line structure, which question
 * segmentation depends on. Tabs are kept as table cell separators.
 */
export function normalizeExtractedText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, '')
    .replace(/ {2,}/g, ' ')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Extract the text layer of one PDF file.
 */
export async function extractPdfText(pdfAbsPath: string): Promise<string> {
  const data = await fs.readFile(pdfAbsPath);
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.text || '';
  } finally {
    await parser.destroy();
  }
}

export class PdfDirectorySource implements DocumentSource {
  constructor(
    private readonly dirs: PdfDirectories,
    private readonly verbose = false
  ) {}

  async load(): Promise<SourceLoadResult> {
    const documents: DocumentInput[] = [];
    const failures: IngestionError[] = [];

    const plan: Array<[DocumentClass, string]> = [
      ['material', this.dirs.materialsDir],
      ['assignment', this.dirs.assignmentsDir]
    ];

    for (const [docClass, dir] of plan) {
      const files = await this.listPdfs(dir);
      console.log(`[PDF] ${docClass === 'material' ? 'Class materials' : 'Assignments'}: ${files.length} file(s) in ${dir}`);

      for (const filename of files) {
        try {
          if (this.verbose) console.log(`[PDF] Extracting ${filename}...`);
          const text = await extractPdfText(path.join(dir, filename));
          documents.push({ class: docClass, filename, rawText: normalizeExtractedText(text) });
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          console.error(`[PDF] Failed to extract text from ${filename}:`, reason);
          failures.push(new IngestionError(filename, docClass, reason));
        }
      }
    }

    return { documents, failures };
  }

  private async listPdfs(dir: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
        .map(entry => entry.name)
        .sort((a, b) => a.localeCompare(b));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.warn(`[PDF] Directory not found: ${dir} (add PDF files there to load them)`);
        return [];
      }
      throw error;
    }
  }
}
