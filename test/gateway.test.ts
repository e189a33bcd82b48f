/**
 * Outbound gateway tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SocketBuilder } from '../src/SocketBuilder.ts';
import { jsonCodec, textCodec } from '../src/codecs.ts';
import { EncodeError, NotConnectedError, TransportSendError } from '../src/errors.ts';
import { OutboundGateway } from '../src/gateway/OutboundGateway.ts';
import type { SocketSender } from '../src/gateway/OutboundGateway.ts';
import { createLogger } from '../src/logger.ts';
import type { TransportConnection } from '../src/transports/Transport.ts';
import type { Codec } from '../src/types.ts';
import { FakeTransport, delay, stateOf, waitUntil } from './helpers.ts';

const URL = 'ws://127.0.0.1:9000/feed';

interface Job {
  producer: string;
  seq: number;
}

const positiveCodec: Codec<number, string> = {
  encode: (n) => {
    if (n < 0) throw new RangeError(`negative: ${n}`);
    return String(n);
  },
  decode: (frame) => String(frame),
};

function stubConnection(send: (frame: string | Uint8Array) => void): TransportConnection {
  return {
    open: true,
    send,
    close: () => {},
    onOpen: () => {},
    onMessage: () => {},
    onError: () => {},
    onClose: () => {},
  };
}

describe('Outbound Gateway', () => {
  describe('send', () => {
    it('should throw NotConnectedError in every state but open', async () => {
      const transport = new FakeTransport('manual');
      const socket = SocketBuilder.create(URL, textCodec)
        .transport(transport)
        .minDelay(20)
        .open();

      assert.throws(() => socket.send('while connecting'), NotConnectedError);

      transport.last.accept();
      socket.send('while open');

      transport.last.drop();
      assert.strictEqual(stateOf(socket), 'reconnecting');
      assert.throws(() => socket.send('while reconnecting'), NotConnectedError);

      socket.close();
      assert.throws(() => socket.send('after close'), NotConnectedError);

      await delay(40);
      assert.strictEqual(transport.connections.length, 1);
      assert.deepStrictEqual(transport.last.sent, ['while open']);
    });

    it('should report encode failures without touching the connection', () => {
      const transport = new FakeTransport('manual');
      const socket = SocketBuilder.create(URL, positiveCodec).transport(transport).open();
      transport.last.accept();

      assert.throws(
        () => socket.send(-1),
        (err: unknown) => {
          assert.ok(err instanceof EncodeError);
          assert.ok(err.cause instanceof RangeError);
          assert.strictEqual(err.message, 'Failed to encode outbound item: negative: -1');
          return true;
        }
      );

      socket.send(7);
      assert.deepStrictEqual(transport.last.sent, ['7']);
      assert.strictEqual(stateOf(socket), 'open');
      socket.close();
    });

    it('should reject values JSON cannot represent', () => {
      const transport = new FakeTransport('manual');
      const socket = SocketBuilder.create(URL, jsonCodec<unknown>()).transport(transport).open();
      transport.last.accept();

      assert.throws(() => socket.send(undefined), EncodeError);
      assert.throws(() => socket.send(10n), EncodeError);
      assert.deepStrictEqual(transport.last.sent, []);
      socket.close();
    });

    it('should wrap transport failures in TransportSendError', () => {
      const gateway = new OutboundGateway(textCodec, createLogger('test'));
      gateway.attach(
        stubConnection(() => {
          throw new Error('buffer full');
        })
      );

      assert.throws(
        () => gateway.send('x'),
        (err: unknown) => {
          assert.ok(err instanceof TransportSendError);
          assert.strictEqual(err.message, 'buffer full');
          return true;
        }
      );
      assert.strictEqual(gateway.sentCount, 0);
    });

    it('should stop forwarding once detached', () => {
      const frames: (string | Uint8Array)[] = [];
      const gateway = new OutboundGateway(textCodec, createLogger('test'));
      gateway.attach(stubConnection((frame) => frames.push(frame)));

      gateway.send('one');
      gateway.detach();

      assert.throws(() => gateway.send('two'), NotConnectedError);
      assert.deepStrictEqual(frames, ['one']);
      assert.strictEqual(gateway.sentCount, 1);
      assert.strictEqual(gateway.ready, false);
    });
  });

  describe('sender handles', () => {
    it('should forward items from concurrent producers in submission order', async () => {
      const transport = new FakeTransport('manual');
      const socket = SocketBuilder.create(URL, jsonCodec<Job>()).transport(transport).open();
      transport.last.accept();

      const produce = async (sender: SocketSender<Job>, producer: string) => {
        for (let seq = 0; seq < 5; seq++) {
          sender.send({ producer, seq });
          await delay(1);
        }
      };
      await Promise.all([produce(socket.sender(), 'a'), produce(socket.sender(), 'b')]);

      const sent: Job[] = transport.last.sent.map((frame) => JSON.parse(String(frame)));
      assert.strictEqual(sent.length, 10);
      assert.deepStrictEqual(
        sent.filter((job) => job.producer === 'a').map((job) => job.seq),
        [0, 1, 2, 3, 4]
      );
      assert.deepStrictEqual(
        sent.filter((job) => job.producer === 'b').map((job) => job.seq),
        [0, 1, 2, 3, 4]
      );
      socket.close();
    });

    it('should target the new connection after a reconnect', async () => {
      const transport = new FakeTransport('accept');
      const socket = SocketBuilder.create(URL, textCodec)
        .transport(transport)
        .minDelay(10)
        .open();
      const sender = socket.sender();
      await waitUntil(() => sender.ready);

      sender.send('first');
      transport.last.drop();
      assert.strictEqual(sender.ready, false);
      assert.throws(() => sender.send('dropped'), NotConnectedError);

      await waitUntil(() => sender.ready);
      sender.send('second');

      assert.deepStrictEqual(transport.connections[0]?.sent, ['first']);
      assert.deepStrictEqual(transport.connections[1]?.sent, ['second']);
      socket.close();
    });
  });
});
