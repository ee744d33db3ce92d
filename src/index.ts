import 'dotenv/config';
import { createGateway } from './app.js';
import { loadConfig } from './config.js';
import { createLLMProvider } from './llm/index.js';

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('[Init] Starting agent tool gateway...');
  const llm = createLLMProvider(config);
  console.log(`[Init] Reasoning backend: ${llm.name}/${llm.model}`);

  const gateway = createGateway({ config, llm });
  console.log(`[Init] ${gateway.dispatcher.toolCount} tools registered`);

  await gateway.server.start();

  console.log(`
✅ ${config.serverName} v${config.serverVersion} ready

  🌐 JSON-RPC:   http://localhost:${gateway.server.port}/mcp
  📡 Streams:    ws://localhost:${gateway.server.port}/ws?threadId=<id>

  🗂️  Volvox:     ${config.volvoxApiUrl}
  🔎 Smart:      ${config.smartApiUrl}
  🧭 Innoscope:  ${config.innoscopeApiUrl}
  📝 Kickstart:  ${config.kickstartApiUrl}
`);

  // Handle shutdown
  const shutdown = async (): Promise<void> => {
    console.log('\n[Shutdown] Gracefully shutting down...');
    await gateway.server.stop();
    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
