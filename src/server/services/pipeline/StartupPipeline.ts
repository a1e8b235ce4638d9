/**
 * One-shot fetch + convert task run before the API starts listening
 *
 * The outcome is returned as a value and handed to the HTTP layer; a failure
 * never propagates as a crash.
 */

import type { ArtifactPaths } from '../artifacts/ArtifactStore.js';
import type { CurriculumFetcher } from '../fetcher/CurriculumFetcher.js';
import type { DocumentConverter } from '../conversion/DocumentConverter.js';
import { toAppError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export type PipelineStage = 'fetch' | 'convert';

export interface PipelineError {
  code: string;
  message: string;
}

export type PipelineResult =
  | { status: 'pending' }
  | {
      status: 'succeeded';
      pdfPath: string;
      artifacts: Omit<ArtifactPaths, 'pdf'>;
      startedAt: string;
      finishedAt: string;
    }
  | {
      status: 'failed';
      stage: PipelineStage;
      error: PipelineError;
      pdfPath?: string;
      startedAt: string;
      finishedAt: string;
    };

export interface StartupPipelineDependencies {
  fetcher: Pick<CurriculumFetcher, 'fetch'>;
  converter: Pick<DocumentConverter, 'convert'>;
  now?: () => Date;
}

export async function runStartupPipeline(deps: StartupPipelineDependencies): Promise<PipelineResult> {
  const log = createChildLogger({ component: 'startup-pipeline' });
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  let stage: PipelineStage = 'fetch';
  let pdfPath: string | undefined;
  try {
    log.info('Fetching curriculum document');
    const fetched = await deps.fetcher.fetch();
    pdfPath = fetched.pdfPath;

    stage = 'convert';
    log.info({ pdfPath }, 'Converting curriculum document');
    const converted = await deps.converter.convert(fetched.pdfPath);

    const result: PipelineResult = {
      status: 'succeeded',
      pdfPath: converted.pdfPath,
      artifacts: { txt: converted.txtPath, xml: converted.xmlPath, structured: converted.structuredPath },
      startedAt,
      finishedAt: now().toISOString(),
    };
    log.info({ pdfPath: result.pdfPath }, 'Startup pipeline succeeded');
    return result;
  } catch (error) {
    const appError = toAppError(error);
    log.error({ error, stage, code: appError.code }, 'Startup pipeline failed');
    return {
      status: 'failed',
      stage,
      error: { code: appError.code, message: appError.message },
      ...(pdfPath ? { pdfPath } : {}),
      startedAt,
      finishedAt: now().toISOString(),
    };
  }
}
