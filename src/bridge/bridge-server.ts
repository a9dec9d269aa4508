/**
 * WebSocket Bridge Server — drive the kernel from another process.
 *
 * Accepts JSON messages over WebSocket (see BridgeSession for the message
 * set). Each connection gets its own BridgeSession and simulation.
 * Binds to localhost only. Process signals are the entry point's business.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { BridgeSession, type BridgeReply } from './session';
import type { BridgeConfig } from './bridge-config';
import { DEFAULT_BRIDGE_CONFIG } from './bridge-config';

export interface BridgeServer {
  wss: WebSocketServer;
  /** Close every client with 1001 and stop listening. */
  close(): Promise<void>;
}

export function startBridgeServer(config: BridgeConfig = DEFAULT_BRIDGE_CONFIG): BridgeServer {
  const wss = new WebSocketServer({
    port: config.port,
    host: config.host,
    perMessageDeflate: false,
    maxPayload: config.maxPayload,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);

    const send = (reply: BridgeReply) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(reply));
      }
    };
    const session = new BridgeSession(send, config);

    ws.on('message', (data: RawData) => {
      let response: BridgeReply;
      try {
        const msg: unknown = JSON.parse(data.toString());
        response = session.handle(msg);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[bridge] error:', message);
        response = { type: 'error', message };
      }
      send(response);
    });

    ws.on('close', () => { session.close(); });
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      session.close();
    });
  });

  function close(): Promise<void> {
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    }
    return new Promise((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        console.log('[bridge] closed');
        resolve();
      });
    });
  }

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://${config.host}:${config.port}`);
  });

  return { wss, close };
}
