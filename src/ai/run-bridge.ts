import { loadGameConfig, DEFAULT_GAME_CONFIG } from '../engine/config';
import { startBridgeServer } from './bridge-server';

async function main(): Promise<void> {
  const port = parseInt(process.env.BRIDGE_PORT ?? '9876', 10);
  if (!Number.isFinite(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${process.env.BRIDGE_PORT}. Must be 1-65535.`);
  }

  const configPath = process.env.BRIDGE_CONFIG;
  const config = configPath ? loadGameConfig(configPath) : DEFAULT_GAME_CONFIG;
  const server = await startBridgeServer({ port, config });

  let closing = false;
  function shutdown(): void {
    if (closing) return;
    closing = true;
    console.log('[bridge] shutting down...');
    server.close().then(
      () => {
        console.log('[bridge] closed');
        process.exit(0);
      },
      (err: unknown) => {
        console.error('[bridge]', err instanceof Error ? err.message : String(err));
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('[bridge]', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
