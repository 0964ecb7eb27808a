import type { FastifyInstance } from 'fastify';
import { PromptController, type PromptBatchProcessor } from '../controllers/prompt.controller';

export interface PromptRoutesOptions {
    pipeline: PromptBatchProcessor;
    maxImagesPerBatch: number;
}

export async function promptRoutes(server: FastifyInstance, opts: PromptRoutesOptions) {
    const controller = new PromptController(opts.pipeline, opts.maxImagesPerBatch);

    server.get('/defaults', (req, res) => controller.getDefaults(req, res));
    server.post('/', (req, res) => controller.generatePrompts(req, res));
}
