import { loadBridgeConfig } from '@verity/schemas/src/config-loader.js';
import { createBridgeRuntime } from '@verity/core/src/runtime/bridge-runtime.js';
import { ReasoningEngineError } from '@verity/shared/src/utils/errors.js';

const DEFAULT_QUERY = 'Is the city library closed on public holidays?';

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(' ') || DEFAULT_QUERY;
  const userId = process.env['VERITY_USER_ID'] ?? 'manual-test';

  const config = loadBridgeConfig();
  const runtime = createBridgeRuntime(config);

  console.log(`\nApp:      ${config.appName}`);
  console.log(`Endpoint: ${config.reasoningEngineUrl}`);
  console.log(`Query:    ${query}`);

  const refreshed = await runtime.refresher.refresh();
  if (!refreshed) {
    console.error('\nCould not obtain an access token. Check the service account key.');
    process.exit(1);
  }

  const started = Date.now();
  try {
    const result = await runtime.callAdk(query, { user: { id: userId } });
    console.log(`\nVerdict:    ${result.verdict}`);
    console.log(`Confidence: ${String(result.confidence)}`);
    console.log(`Duration:   ${String(Date.now() - started)}ms`);
    console.log('\n--- Final answer ---');
    console.log(result.rawFinal || '(empty)');
  } catch (error) {
    if (error instanceof ReasoningEngineError) {
      console.error(`\nQuery failed (${error.reason}): ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Query failed:', error);
  process.exit(1);
});
