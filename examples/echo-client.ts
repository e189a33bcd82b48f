/**
 * Echo Client Example
 *
 * Starts a local echo server, connects a reconnecting socket to it, then
 * kills the server-side connection to show the socket recovering.
 *
 * Run with: npm run example:echo
 * Add DEBUG=reconnecting-ws:* to see the state machine at work.
 */

import { WebSocketServer } from 'ws';
import { Type } from 'typebox';
import type { Static } from 'typebox';
import { SocketBuilder, formatState, jsonCodec } from '../src/index.ts';

const Echo = Type.Object({ seq: Type.Number(), text: Type.String() });
type Echo = Static<typeof Echo>;

const PORT = 3100;

async function main() {
  // 1. A server that echoes every frame back
  const server = new WebSocketServer({ host: '127.0.0.1', port: PORT });
  server.on('connection', (ws) => {
    ws.on('message', (data, isBinary) => ws.send(data, { binary: isBinary }));
  });

  // 2. The client: JSON frames validated against the Echo schema
  const socket = SocketBuilder.create(`ws://127.0.0.1:${PORT}`, jsonCodec<Echo, Echo>(Echo))
    .backoff({ minDelayMs: 200, maxDelayMs: 2000, maxRetries: 5, jitter: 0.2 })
    .open();

  let seq = 0;
  let opens = 0;

  for await (const event of socket) {
    switch (event.type) {
      case 'state':
        console.log(`[Client] ${formatState(event.state)}`);
        if (event.state.kind === 'open') {
          opens++;
          socket.send({ seq: ++seq, text: `hello #${opens}` });
        }
        break;

      case 'message':
        console.log(`[Client] Echo ${event.data.seq}: ${event.data.text}`);
        if (opens === 1) {
          // 3. Simulate a network failure
          for (const client of server.clients) client.terminate();
        } else {
          socket.close('done');
        }
        break;

      case 'decode-error':
        console.warn(`[Client] ${event.error.message}`);
        break;
    }
  }

  server.close();
  console.log('Example complete!');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
