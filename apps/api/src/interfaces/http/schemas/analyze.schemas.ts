import { z } from 'zod';

export const ReportParamsSchema = z.object({
    '*': z.string().default(''),
});

export interface ErrorResponse {
    error: string;
}
