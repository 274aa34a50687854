import { FastifyInstance } from 'fastify';
import { ReportController } from '../controllers/report.controller';

export interface ReportRoutesOptions {
    reportsDir: string;
}

export async function reportRoutes(server: FastifyInstance, opts: ReportRoutesOptions) {
    const controller = new ReportController(opts.reportsDir);

    server.get('/*', (req, res) => controller.download(req, res));
}
