import { config } from 'dotenv';

import { runDeterminismCli } from '../lib/data_plane/cli/determinismCli';

config({ path: '.env.local' });
config();

async function main() {
    const { output, exitCode } = await runDeterminismCli(process.argv.slice(2));
    process.stdout.write(`${output}\n`);
    process.exitCode = exitCode;
}

main().catch((error: unknown) => {
    console.error('[determinism] Fatal:', error);
    process.exit(1);
});
