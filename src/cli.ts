import { loadConfig } from './config';
import { createBuildSystem, warnOnCrossVolume } from './container';

/** Runs one build in the foreground and exits 0 on success, 1 otherwise. */
async function main(): Promise<number> {
  const config = loadConfig();
  await warnOnCrossVolume(config);

  const { orchestrator } = createBuildSystem(config, { history: null });
  const result = await orchestrator.runBuildOnce();

  const seconds = (result.durationMs / 1000).toFixed(2);
  if (result.success) {
    console.log(`${result.message} in ${seconds}s`);
    console.log(
      `  documents: ${result.stats.documentsProcessed}, pages: ${result.stats.pagesRendered}, assets: ${result.stats.assetsCopied}`
    );
    console.log(`  output: ${result.outputDir}`);
    return 0;
  }

  console.error(`${result.message} after ${seconds}s`);
  if (result.error) console.error(`  cause: ${result.error.message}`);
  if (result.backupDir) console.error(`  previous output kept at: ${result.backupDir}`);
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
