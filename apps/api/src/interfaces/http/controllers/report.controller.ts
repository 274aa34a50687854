import { FastifyReply, FastifyRequest } from 'fastify';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import path from 'path';
import { ReportParamsSchema, ErrorResponse } from '../schemas/analyze.schemas';

export class ReportController {
    constructor(private readonly reportsDir: string) { }

    private async resolveReport(filename: string): Promise<string | null> {
        // Only plain file names directly inside the reports directory
        if (!filename || filename !== path.basename(filename)) {
            return null;
        }

        const fullPath = path.join(this.reportsDir, filename);
        try {
            const info = await stat(fullPath);
            return info.isFile() ? fullPath : null;
        } catch {
            return null;
        }
    }

    async download(request: FastifyRequest, reply: FastifyReply) {
        const { '*': filename } = ReportParamsSchema.parse(request.params);
        const fullPath = await this.resolveReport(filename);

        if (!fullPath) {
            request.log.warn({ filename }, 'Report not found');
            const notFound: ErrorResponse = { error: 'Report not found' };
            return reply.code(404).send(notFound);
        }

        return reply
            .header('Content-Type', 'application/pdf')
            .header('Content-Disposition', `attachment; filename="${filename}"`)
            .send(createReadStream(fullPath));
    }
}
