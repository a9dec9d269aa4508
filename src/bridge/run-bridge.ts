import { startBridgeServer } from './bridge-server';
import { DEFAULT_BRIDGE_CONFIG, parsePort } from './bridge-config';

let port: number;
try {
  port = parsePort(process.env.BRIDGE_PORT);
} catch (err) {
  console.error(`[bridge] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const server = startBridgeServer({ ...DEFAULT_BRIDGE_CONFIG, port });

function shutdown(): void {
  console.log('[bridge] shutting down...');
  setTimeout(() => process.exit(1), 5000).unref();
  void server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(`[bridge] close failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    },
  );
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
