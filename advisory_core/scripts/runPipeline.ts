import { config } from 'dotenv';

import { runPipelineCli } from '../lib/data_plane/cli/pipelineCli';

config({ path: '.env.local' });
config();

async function main() {
    const { output } = await runPipelineCli(process.argv.slice(2));
    process.stdout.write(`${output}\n`);
}

main().catch((error: unknown) => {
    console.error('[runPipeline] Fatal:', error);
    process.exit(1);
});
