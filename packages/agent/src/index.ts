import { loadAgentConfig, loadAgentSecrets } from './config.js';
import { createAgentRuntime } from './runtime.js';
import { startAgentServer } from './server.js';

async function main(): Promise<void> {
  const config = loadAgentConfig();
  const secrets = loadAgentSecrets(config.secretsFilePath);
  const runtime = createAgentRuntime({ config, secrets });
  await runtime.init();

  const server = startAgentServer({ config, runtime });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[agent] received ${signal}, shutting down`);
    server.close();
    runtime
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[agent] shutdown failed', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[agent] failed to start', error);
  process.exit(1);
});
