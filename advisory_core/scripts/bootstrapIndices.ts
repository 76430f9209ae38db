import { config } from 'dotenv';

import { loadPipelineConfig, resolveRuntimeEnvironment } from '../lib/config';
import { createElasticsearchClient, indicesClientOf } from '../lib/data_plane/es/clients';
import { bootstrapIndices } from '../lib/data_plane/mappings';

config({ path: '.env.local' });
config();

async function main() {
    const runtime = resolveRuntimeEnvironment();
    const pipelineConfig = loadPipelineConfig(runtime.configPath ?? undefined);
    const indices = { ...pipelineConfig.indices, history: runtime.historyIndex ?? pipelineConfig.indices.history };

    console.log(`[Bootstrap] Using ES_URL: ${runtime.esUrl ?? '(unset)'}`);
    const client = createElasticsearchClient(runtime);

    const report = await bootstrapIndices(indicesClientOf(client), indices);
    for (const result of report.results) {
        console.log(`[Bootstrap] ${result.index} (${result.role}): ${result.action}. ${result.message}`);
    }
}

main().catch((error: unknown) => {
    console.error('[Bootstrap] Fatal:', error);
    process.exit(1);
});
