import { FastifyReply, FastifyRequest } from 'fastify';
import type { AnalysisPipeline } from '../../../services/analysis-pipeline.service';
import { detectImageMimeType } from '../../../infra/imaging/image-payload';
import type { ErrorResponse } from '../schemas/analyze.schemas';

const IMAGE_FIELD = 'image';

export class AnalyzeController {
    constructor(private readonly pipeline: Pick<AnalysisPipeline, 'run'>) { }

    async analyze(request: FastifyRequest, reply: FastifyReply) {
        const noImage: ErrorResponse = { error: 'No image provided' };

        if (!request.isMultipart()) {
            return reply.code(400).send(noImage);
        }

        let imageBuffer: Buffer | null = null;

        for await (const part of request.parts()) {
            if (part.type !== 'file') continue;

            if (part.fieldname === IMAGE_FIELD && imageBuffer === null) {
                imageBuffer = await part.toBuffer();
            } else {
                // Unread file streams stall the multipart iterator
                part.file.resume();
            }
        }

        if (!imageBuffer || imageBuffer.length === 0) {
            return reply.code(400).send(noImage);
        }

        const mimeType = detectImageMimeType(imageBuffer);
        if (!mimeType) {
            const unsupported: ErrorResponse = { error: 'Unsupported image format' };
            return reply.code(400).send(unsupported);
        }

        request.log.info({ mimeType, bytes: imageBuffer.length }, 'Received image for analysis');

        const result = await this.pipeline.run(imageBuffer);
        return reply.code(200).send(result);
    }
}
