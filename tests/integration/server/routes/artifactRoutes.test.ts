import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { createApp } from '../../../../src/server/app.js';
import { ArtifactStore } from '../../../../src/server/services/artifacts/ArtifactStore.js';
import type { PipelineResult } from '../../../../src/server/services/pipeline/StartupPipeline.js';

const PDF_BYTES = Buffer.from('%PDF-1.4\n%route test\n');

describe('artifact routes', () => {
  let dataDir: string;
  let store: ArtifactStore;
  let pdfPath: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'routes-'));
    store = new ArtifactStore(dataDir);
    await store.ensureLayout();
    pdfPath = store.downloadPath('plan.pdf');
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  async function seedSource(): Promise<void> {
    await writeFile(pdfPath, PDF_BYTES);
    await store.writeLatestPointer(pdfPath);
    await writeFile(store.derivedPath(pdfPath, 'txt'), 'Учебный план\n');
  }

  it('describes the service on GET /', async () => {
    const res = await request(createApp({ store })).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      service: 'curriculum-pipeline',
      description: 'Downloads the programme curriculum PDF and serves its text and XML renderings',
      endpoints: ['GET /', 'GET /status', 'GET /files/pdf', 'GET /files/txt', 'GET /files/xml', 'GET /files/structured'],
    });
  });

  it('serves the bytes of the PDF the latest pointer references', async () => {
    await seedSource();

    const res = await request(createApp({ store })).get('/files/pdf').responseType('blob');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('application/pdf');
    expect(Buffer.compare(res.body, PDF_BYTES)).toBe(0);
  });

  it('serves text artifacts as text/plain', async () => {
    await seedSource();

    const res = await request(createApp({ store })).get('/files/txt');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.text).toBe('Учебный план\n');
  });

  it('answers 404 FILE_MISSING for an artifact not produced yet', async () => {
    await seedSource();

    const res = await request(createApp({ store })).get('/files/xml');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({
      error: 'Not Found',
      code: 'FILE_MISSING',
      statusCode: 404,
      path: '/files/xml',
    });
    expect(res.body.message).toBe(`Artifact 'xml' has not been produced yet (${store.derivedPath(pdfPath, 'xml')})`);
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('answers 404 FILE_MISSING when nothing has been fetched', async () => {
    const res = await request(createApp({ store })).get('/files/pdf');

    expect(res.status).toBe(404);
    expect(res.body.code).toBe('FILE_MISSING');
    expect(res.body.message).toBe("Artifact 'pdf' has not been produced yet");
  });

  it('answers 404 NOT_FOUND for an unknown kind', async () => {
    const res = await request(createApp({ store })).get('/files/docx');

    expect(res.status).toBe(404);
    expect(res.body.code).toBe('NOT_FOUND');
    expect(res.body.message).toBe("Artifact kind with identifier 'docx' not found");
  });

  it('falls back to the pipeline result when the pointer is gone', async () => {
    await writeFile(pdfPath, PDF_BYTES);
    const pipeline: PipelineResult = {
      status: 'succeeded',
      pdfPath,
      artifacts: store.artifactPaths(pdfPath),
      startedAt: '2024-05-06T07:00:00.000Z',
      finishedAt: '2024-05-06T07:00:05.000Z',
    };

    const res = await request(createApp({ store, pipeline })).get('/files/pdf').responseType('blob');

    expect(res.status).toBe(200);
    expect(Buffer.compare(res.body, PDF_BYTES)).toBe(0);
  });

  it('reports a pending pipeline and no artifacts on a fresh store', async () => {
    const res = await request(createApp({ store })).get('/status');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      ready: false,
      latest: null,
      pipeline: { status: 'pending' },
      artifacts: {
        pdf: { path: null, exists: false },
        txt: { path: null, exists: false },
        xml: { path: null, exists: false },
        structured: { path: null, exists: false },
      },
    });
  });

  it('reports the latest pointer, the pipeline failure and per-artifact presence', async () => {
    await seedSource();
    const pipeline: PipelineResult = {
      status: 'failed',
      stage: 'convert',
      error: { code: 'CONVERSION_ERROR', message: 'Conversion failed' },
      pdfPath,
      startedAt: '2024-05-06T07:00:00.000Z',
      finishedAt: '2024-05-06T07:00:05.000Z',
    };

    const res = await request(createApp({ store, pipeline })).get('/status');

    expect(res.status).toBe(200);
    expect(res.body.ready).toBe(false);
    expect(res.body.latest).toBe(pdfPath);
    expect(res.body.pipeline).toEqual(pipeline);
    expect(res.body.artifacts.pdf).toEqual({ path: pdfPath, exists: true });
    expect(res.body.artifacts.txt.exists).toBe(true);
    expect(res.body.artifacts.xml).toEqual({ path: store.derivedPath(pdfPath, 'xml'), exists: false });
  });

  it('is ready once every artifact exists', async () => {
    await seedSource();
    await writeFile(store.derivedPath(pdfPath, 'xml'), '<document/>');
    await writeFile(store.derivedPath(pdfPath, 'structured'), '<curriculum/>');

    const res = await request(createApp({ store })).get('/status');

    expect(res.body.ready).toBe(true);
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await request(createApp({ store })).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ code: 'NOT_FOUND', path: '/nope', message: "Route with identifier 'GET /nope' not found" });
  });

  it('leaves request bodies unread', async () => {
    const res = await request(createApp({ store }))
      .post('/status')
      .set('Content-Type', 'application/json')
      .send('{not json');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ code: 'NOT_FOUND', message: "Route with identifier 'POST /status' not found" });
  });

  it('echoes the request id or generates one', async () => {
    const app = createApp({ store });

    const echoed = await request(app).get('/').set('X-Request-ID', 'req-123');
    const generated = await request(app).get('/');

    expect(echoed.headers['x-request-id']).toBe('req-123');
    expect(generated.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
