import { Router, Request, Response, NextFunction } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { FileMissingError, NotFoundError } from '../types/errors.js';
import {
    ARTIFACT_KINDS,
    artifactKindSchema,
    type ArtifactKind,
    type ArtifactStore,
} from '../services/artifacts/ArtifactStore.js';
import type { PipelineResult } from '../services/pipeline/StartupPipeline.js';

const CONTENT_TYPES: Record<ArtifactKind, string> = {
    pdf: 'application/pdf',
    txt: 'text/plain',
    xml: 'application/xml',
    structured: 'application/xml',
};

export interface ArtifactRouteDependencies {
    store: ArtifactStore;
    pipeline: PipelineResult;
}

/**
 * Creates the read-only routes over the artifact store
 */
export function createArtifactRoutes({ store, pipeline }: ArtifactRouteDependencies): Router {
    const router = Router();

    // The Latest Pointer wins; the pipeline value covers a pointer removed after startup
    const currentSource = async (): Promise<string | null> => {
        const latest = await store.readLatestPointer();
        if (latest) return latest;
        return pipeline.status === 'succeeded' ? pipeline.pdfPath : null;
    };

    /**
     * GET /
     * Service description
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json({
            service: 'curriculum-pipeline',
            description: 'Downloads the programme curriculum PDF and serves its text and XML renderings',
            endpoints: ['GET /', 'GET /status', ...ARTIFACT_KINDS.map((kind) => `GET /files/${kind}`)],
        });
    });

    /**
     * GET /status
     * Latest Pointer, startup pipeline outcome and per-artifact presence
     */
    router.get('/status', asyncHandler(async (_req: Request, res: Response) => {
        const latest = await store.readLatestPointer();
        const artifacts = await store.describe(await currentSource());
        const ready = ARTIFACT_KINDS.every((kind) => artifacts[kind].exists);

        res.json({ ready, latest, pipeline, artifacts });
    }));

    /**
     * GET /files/:kind
     * Stream one artifact of the current source document
     */
    router.get('/files/:kind', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
        const parsed = artifactKindSchema.safeParse(req.params.kind);
        if (!parsed.success) {
            throw new NotFoundError('Artifact kind', req.params.kind);
        }
        const kind = parsed.data;

        const source = await currentSource();
        if (!source) {
            throw new FileMissingError(kind);
        }
        const filePath = store.artifactPaths(source)[kind];
        if (!(await store.exists(filePath))) {
            throw new FileMissingError(kind, filePath);
        }

        res.type(CONTENT_TYPES[kind]);
        res.sendFile(filePath, { dotfiles: 'allow' }, (error?: Error) => {
            if (!error) return;
            // Removed between the existence check and the read
            if ('code' in error && error.code === 'ENOENT') {
                next(new FileMissingError(kind, filePath));
                return;
            }
            next(error);
        });
    }));

    return router;
}
