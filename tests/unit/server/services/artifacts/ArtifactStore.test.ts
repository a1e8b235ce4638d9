import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ArtifactStore, documentStem } from '../../../../../src/server/services/artifacts/ArtifactStore.js';

describe('ArtifactStore', () => {
  let dataDir: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'store-'));
    store = new ArtifactStore(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('derives artifact paths from the source stem', () => {
    expect(store.artifactPaths('/elsewhere/plan.pdf')).toEqual({
      pdf: '/elsewhere/plan.pdf',
      txt: path.join(dataDir, 'processed', 'plan.txt'),
      xml: path.join(dataDir, 'processed', 'plan.xml'),
      structured: path.join(dataDir, 'processed', 'plan.structured.xml'),
    });
  });

  it('strips the pdf extension case-insensitively', () => {
    expect(documentStem('/a/Plan.PDF')).toBe('Plan');
    expect(documentStem('/a/notes.bin')).toBe('notes');
  });

  it('writes atomically without leaving temp files behind', async () => {
    const target = path.join(store.processedDir, 'plan.txt');

    await store.writeAtomic(target, 'first');
    await store.writeAtomic(target, 'second');

    expect(await readdir(store.processedDir)).toEqual(['plan.txt']);
    expect(await readFile(target, 'utf-8')).toBe('second');
  });

  it('round-trips the latest pointer and treats a blank one as absent', async () => {
    expect(await store.readLatestPointer()).toBeNull();

    const pdfPath = store.downloadPath('plan.pdf');
    await store.writeLatestPointer(pdfPath);
    expect(await store.readLatestPointer()).toBe(pdfPath);

    await writeFile(store.latestPointerPath, '  \n');
    expect(await store.readLatestPointer()).toBeNull();
  });

  it('describes artifacts with and without a source', async () => {
    expect(await store.describe(null)).toEqual({
      pdf: { path: null, exists: false },
      txt: { path: null, exists: false },
      xml: { path: null, exists: false },
      structured: { path: null, exists: false },
    });

    await store.ensureLayout();
    const pdfPath = store.downloadPath('plan.pdf');
    await writeFile(pdfPath, '%PDF-1.4');
    await writeFile(store.derivedPath(pdfPath, 'txt'), 'text');

    const status = await store.describe(pdfPath);
    expect(status.pdf).toEqual({ path: pdfPath, exists: true });
    expect(status.txt).toEqual({ path: path.join(store.processedDir, 'plan.txt'), exists: true });
    expect(status.xml.exists).toBe(false);
    expect(status.structured.exists).toBe(false);
  });
});
