/**
 * ArtifactStore - directory convention for source and derived documents
 *
 * Layout under the data directory:
 * - `downloads/`  raw PDFs
 * - `processed/`  derived `<stem>.txt`, `<stem>.xml`, `<stem>.structured.xml`
 * - `latest.txt`  Latest Pointer, the absolute path of the current PDF
 *
 * Writes go to a temp file in the target directory and are renamed into place,
 * so readers never see a partially written file.
 */

import { mkdir, readFile, rename, stat, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';

export const ARTIFACT_KINDS = ['pdf', 'txt', 'xml', 'structured'] as const;

export const artifactKindSchema = z.enum(ARTIFACT_KINDS);

export type ArtifactKind = z.infer<typeof artifactKindSchema>;

export type DerivedArtifactKind = Exclude<ArtifactKind, 'pdf'>;

const DERIVED_SUFFIXES: Record<DerivedArtifactKind, string> = {
  txt: '.txt',
  xml: '.xml',
  structured: '.structured.xml',
};

export interface ArtifactPaths {
  pdf: string;
  txt: string;
  xml: string;
  structured: string;
}

export interface ArtifactEntry {
  path: string | null;
  exists: boolean;
}

export type ArtifactStatus = Record<ArtifactKind, ArtifactEntry>;

/**
 * File name without directory and without the `.pdf` extension
 */
export function documentStem(pdfPath: string): string {
  const base = path.basename(pdfPath);
  return base.toLowerCase().endsWith('.pdf') ? base.slice(0, -'.pdf'.length) : path.parse(base).name;
}

export class ArtifactStore {
  readonly dataDir: string;
  readonly downloadsDir: string;
  readonly processedDir: string;
  readonly latestPointerPath: string;

  constructor(dataDir: string) {
    this.dataDir = path.resolve(dataDir);
    this.downloadsDir = path.join(this.dataDir, 'downloads');
    this.processedDir = path.join(this.dataDir, 'processed');
    this.latestPointerPath = path.join(this.dataDir, 'latest.txt');
  }

  async ensureLayout(): Promise<void> {
    await mkdir(this.downloadsDir, { recursive: true });
    await mkdir(this.processedDir, { recursive: true });
  }

  downloadPath(fileName: string): string {
    return path.join(this.downloadsDir, fileName);
  }

  derivedPath(pdfPath: string, kind: DerivedArtifactKind): string {
    return path.join(this.processedDir, `${documentStem(pdfPath)}${DERIVED_SUFFIXES[kind]}`);
  }

  artifactPaths(pdfPath: string): ArtifactPaths {
    return {
      pdf: path.resolve(pdfPath),
      txt: this.derivedPath(pdfPath, 'txt'),
      xml: this.derivedPath(pdfPath, 'xml'),
      structured: this.derivedPath(pdfPath, 'structured'),
    };
  }

  /**
   * Write a file through a temp sibling and rename it over the target
   */
  async writeAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  }

  async writeLatestPointer(pdfPath: string): Promise<void> {
    const resolved = path.resolve(pdfPath);
    await this.writeAtomic(this.latestPointerPath, resolved);
    logger.debug({ pdfPath: resolved }, 'Latest pointer updated');
  }

  /**
   * Current Latest Pointer value, or null when no document has been fetched
   */
  async readLatestPointer(): Promise<string | null> {
    try {
      const value = (await readFile(this.latestPointerPath, 'utf-8')).trim();
      return value.length > 0 ? value : null;
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw error;
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  /**
   * Path and existence of each artifact of the given source document
   */
  async describe(pdfPath: string | null): Promise<ArtifactStatus> {
    const paths = pdfPath ? this.artifactPaths(pdfPath) : null;
    const describeOne = async (filePath: string | null): Promise<ArtifactEntry> => ({
      path: filePath,
      exists: filePath ? await this.exists(filePath) : false,
    });
    const [pdf, txt, xml, structured] = await Promise.all([
      describeOne(paths?.pdf ?? null),
      describeOne(paths?.txt ?? null),
      describeOne(paths?.xml ?? null),
      describeOne(paths?.structured ?? null),
    ]);
    return { pdf, txt, xml, structured };
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
