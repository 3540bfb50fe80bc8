/**
 * @fileoverview Source document loading
 *
 * Each `*.json` file under the source directory holds one document:
 * `{id, chapters: [{id, paragraphs: [{id, content}]}]}` where `content` is
 * HTML. Files are read in sorted path order so ids are assigned in the same
 * order on every run.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { DEFAULT_MIN_PARAGRAPH_LENGTH } from '../config/index.js';
import type { ParagraphInput } from '../core/types.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { formatZodIssues } from '../utils/output_validator.js';
import { cleanHtml } from './html_cleaner.js';

const integerId = z.number().int();

export const sourceDocumentSchema = z.object({
  id: integerId,
  chapters: z
    .array(
      z.object({
        id: integerId,
        paragraphs: z
          .array(
            z.object({
              id: integerId,
              content: z.string().nullish(),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export type SourceDocument = z.infer<typeof sourceDocumentSchema>;

export interface LoadOptions {
  /** Cleaned paragraphs shorter than this are skipped as noise. */
  minLength?: number;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface LoadResult {
  paragraphs: ParagraphInput[];
  files: string[];
  skipped: SkippedFile[];
}

/** Flatten one document into indexable paragraphs. */
export function extractParagraphs(document: SourceDocument, options: LoadOptions = {}): ParagraphInput[] {
  const minLength = options.minLength ?? DEFAULT_MIN_PARAGRAPH_LENGTH;
  const paragraphs: ParagraphInput[] = [];

  for (const chapter of document.chapters) {
    for (const paragraph of chapter.paragraphs) {
      if (!paragraph.content) continue;
      const text = cleanHtml(paragraph.content);
      if (text.length === 0 || text.length < minLength) continue;
      paragraphs.push({
        text,
        metadata: { doc_id: document.id, chapter_id: chapter.id, paragraph_id: paragraph.id },
      });
    }
  }
  return paragraphs;
}

export async function loadDocumentsFromDirectory(directory: string, options: LoadOptions = {}): Promise<LoadResult> {
  const files = (await glob('*.json', { cwd: directory, absolute: true, nodir: true })).sort();
  const paragraphs: ParagraphInput[] = [];
  const loaded: string[] = [];
  const skipped: SkippedFile[] = [];

  for (const filePath of files) {
    const name = path.basename(filePath);
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error: unknown) {
      skipped.push({ file: name, reason: getErrorMessage(error) });
      logWarning('Skipping unreadable source file', { file: name, error: getErrorMessage(error) });
      continue;
    }

    const parsed = sourceDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = formatZodIssues(parsed.error).join('; ');
      skipped.push({ file: name, reason });
      logWarning('Skipping malformed source file', { file: name, error: reason });
      continue;
    }

    const extracted = extractParagraphs(parsed.data, options);
    paragraphs.push(...extracted);
    loaded.push(name);
    logInfo('Loaded source file', { file: name, docId: parsed.data.id, paragraphs: extracted.length });
  }

  return { paragraphs, files: loaded, skipped };
}
