import fs from 'fs';
import { env } from '../src/config/env';
import { buildPipelineConfig } from '../src/config/pipeline-config';
import { createAnalysisPipeline } from '../src/services/create-analysis-pipeline';

const cliLogger = {
    debug: () => undefined,
    info: (obj: unknown, msg?: string) => console.info(msg ?? '', obj),
    warn: (obj: unknown, msg?: string) => console.warn(msg ?? '', obj),
    error: (obj: unknown, msg?: string) => console.error(msg ?? '', obj),
};

async function main() {
    const imagePath = process.argv[2];

    if (!imagePath) {
        console.error('Please provide an image path: tsx apps/api/scripts/analyze-image.ts <path>');
        process.exit(1);
    }

    if (!env.GEMINI_API_KEY) {
        console.error('Please set GEMINI_API_KEY in .env or as environment variable');
        process.exit(1);
    }

    const pipeline = createAnalysisPipeline(
        buildPipelineConfig(env),
        { apiKey: env.GEMINI_API_KEY, modelName: env.GEMINI_MODEL_VISION },
        cliLogger
    );

    console.log(`🔍 Analyzing ${imagePath}...`);

    const start = Date.now();
    const result = await pipeline.run(fs.readFileSync(imagePath));
    const duration = Date.now() - start;

    console.log('✅ Analysis complete:');
    console.log(JSON.stringify(result, null, 2));
    console.log(`\n⏱️ Duration: ${duration}ms`);
}

main().catch((error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
