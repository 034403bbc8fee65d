/**
 * Input Validator
 *
 * Gates a conversion request before anything is spawned. The only side
 * effect is a read-only stat of each selected file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import {
  AudiobookMetadata,
  ConversionJob,
  ConversionRequest,
  SourceFile,
  ValidationError,
} from './conversion-types.js';
import { transitionJob } from './job-state.js';

export const DEFAULT_ACCEPTED_EXTENSIONS: readonly string[] = ['.mp3'];
export const OUTPUT_EXTENSION = '.m4b';

export interface ValidatorOptions {
  acceptedExtensions?: readonly string[];
  cwd?: string;
  createId?: () => string;
}

export type ValidationResult =
  | { success: true; job: ConversionJob }
  | { success: false; error: ValidationError; job: ConversionJob };

function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve the destination and make sure it carries the .m4b extension.
 */
export function normalizeOutputPath(outputPath: string, cwd: string = process.cwd()): string {
  const resolved = path.resolve(cwd, outputPath.trim());
  return path.extname(resolved).toLowerCase() === OUTPUT_EXTENSION
    ? resolved
    : `${resolved}${OUTPUT_EXTENSION}`;
}

function checkFields(request: ConversionRequest): ValidationError | null {
  if (!request.files || request.files.length === 0) {
    return { kind: 'empty-selection', message: 'No input files selected' };
  }
  if (!request.title?.trim()) {
    return { kind: 'missing-title', message: 'Title is required' };
  }
  if (!request.author?.trim()) {
    return { kind: 'missing-author', message: 'Author is required' };
  }
  if (!request.outputPath?.trim()) {
    return { kind: 'missing-destination', message: 'No destination file chosen' };
  }
  return null;
}

function checkFiles(files: string[], accepted: readonly string[]): ValidationError | null {
  const extensions = accepted.map(ext => ext.toLowerCase());

  for (const file of files) {
    if (!isRegularFile(file)) {
      return { kind: 'file-not-found', path: file, message: `File not found: ${file}` };
    }
    if (!extensions.includes(path.extname(file).toLowerCase())) {
      return { kind: 'unsupported-format', path: file, message: `Unsupported format: ${file}` };
    }
  }
  return null;
}

/**
 * Validate a request and build the job it describes.
 * The job leaves here either still `validating` (ready to run) or `invalid`.
 * Errors are reported in a fixed order: selection, title, author,
 * destination, then each file in playback order.
 */
export function validateConversionRequest(
  request: ConversionRequest,
  options: ValidatorOptions = {}
): ValidationResult {
  const cwd = options.cwd ?? process.cwd();
  const files = (request.files ?? []).map(file => path.resolve(cwd, file));
  const sources: SourceFile[] = files.map((filePath, position) => Object.freeze({ path: filePath, position }));
  const metadata: AudiobookMetadata = Object.freeze({
    title: (request.title ?? '').trim(),
    author: (request.author ?? '').trim(),
  });

  const job: ConversionJob = {
    id: (options.createId ?? randomUUID)(),
    files: Object.freeze(sources),
    metadata,
    outputPath: request.outputPath?.trim() ? normalizeOutputPath(request.outputPath, cwd) : '',
    status: 'created',
    createdAt: new Date().toISOString(),
  };
  transitionJob(job, 'validating');

  const error =
    checkFields(request) ??
    checkFiles(files, options.acceptedExtensions ?? DEFAULT_ACCEPTED_EXTENSIONS);
  if (error) {
    transitionJob(job, 'invalid');
    return { success: false, error, job };
  }

  return { success: true, job };
}

/**
 * Positions must be a dense 0-based sequence with no duplicates.
 */
export function hasDensePositions(files: readonly SourceFile[]): boolean {
  const seen = new Set(files.map(f => f.position));
  if (seen.size !== files.length) return false;
  for (let i = 0; i < files.length; i++) {
    if (!seen.has(i)) return false;
  }
  return true;
}
