/**
 * TCP 통합 테스트
 * 프로세스 안에서 띄운 net 서버에 실제 소켓으로 연결합니다.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'net';
import { TriggerwareClient } from '../../src/client/TriggerwareClient.js';
import { FrameParser } from '../../src/connection/FrameParser.js';
import type { JsonRpcEnvelope } from '../../src/connection/schema.js';
import { ConnectionClosedError } from '../../src/errors/RpcErrors.js';
import { FolQuery } from '../../src/query/Query.js';
import { silentLogger } from '../helpers/fakeServer.js';

type RequestHandler = (request: JsonRpcEnvelope, socket: Socket) => void;

interface RunningServer {
  server: Server;
  port: number;
  sockets: Socket[];
}

function reply(request: JsonRpcEnvelope, result: unknown): string {
  return JSON.stringify({ jsonrpc: '2.0', id: request.id, result });
}

/** 요청마다 handler를 부르는 최소 서버 */
function startServer(handler: RequestHandler): Promise<RunningServer> {
  const sockets: Socket[] = [];
  const server = createServer((socket) => {
    sockets.push(socket);
    const parser = new FrameParser();
    socket.on('data', (chunk: Buffer) => {
      parser.push(chunk);
      for (const frame of parser.drain()) {
        if (frame.kind === 'message') handler(frame.envelope, socket);
      }
    });
    socket.on('error', () => {});
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('TCP 주소를 얻지 못했습니다'));
        return;
      }
      resolve({ server, port: address.port, sockets });
    });
  });
}

function stopServer(running: RunningServer): Promise<void> {
  for (const socket of running.sockets) socket.destroy();
  return new Promise((resolve) => running.server.close(() => resolve()));
}

describe('TCP 통합', () => {
  let running: RunningServer | undefined;
  let client: TriggerwareClient | undefined;

  afterEach(async () => {
    client?.close();
    client = undefined;
    if (running) await stopServer(running);
    running = undefined;
  });

  async function connect(handler: RequestHandler): Promise<TriggerwareClient> {
    running = await startServer(handler);
    client = await TriggerwareClient.connect({
      host: '127.0.0.1',
      port: running.port,
      fetchSize: 2,
      logger: silentLogger(),
    });
    return client;
  }

  it('여러 TCP 세그먼트로 나뉜 응답으로 결과를 끝까지 읽어야 합니다', async () => {
    const fetches: unknown[] = [];
    const connected = await connect((request, socket) => {
      if (request.method === 'execute-query') {
        socket.write(reply(request, { handle: 8, signature: [{ attribute: 'a', type: 'double' }], batch: { tuples: [] } }));
      } else if (request.method === 'next-resultset-batch') {
        fetches.push(request.params);
        const text = reply(request, { batch: { tuples: [[2.9], [3.1]], exhausted: true } });
        socket.write(text.slice(0, 17));
        setTimeout(() => socket.write(text.slice(17)), 10);
      }
    });

    const rows = await connected.executeQuery(new FolQuery('((a) s.t. (inflation 1991 1995 a))'));

    expect(await rows.pull(5)).toEqual([[2.9], [3.1]]);
    expect(fetches).toEqual([[8, 2, null]]);
  });

  it('응답과 같은 세그먼트에 도착한 초기 보고를 받아야 합니다', async () => {
    const connected = await connect((request, socket) => {
      if (request.method === 'create-polled-query' && request.params && !Array.isArray(request.params)) {
        const notification = JSON.stringify({
          jsonrpc: '2.0',
          method: request.params.method,
          params: { delta: { added: [[1.0]], deleted: [] } },
        });
        socket.write(`${reply(request, { handle: 12 })}\n${notification}`);
      }
    });
    const handleNotification = vi.fn();

    const polled = await connected.createPolledQuery(
      new FolQuery('((a) s.t. (inflation 1991 1995 a))'),
      { handleNotification },
      { schedule: 60, controls: { reportInitial: 'with delta' } },
    );

    await vi.waitFor(() => expect(handleNotification).toHaveBeenCalledWith([[1]], []));
    expect(polled.handle).toBe(12);
  });

  it('서버가 연결을 끊으면 대기 중인 요청이 실패하고 close 이벤트가 발생해야 합니다', async () => {
    const connected = await connect((request, socket) => {
      if (request.method === 'validate') socket.end();
    });
    const onClose = vi.fn();
    connected.on('close', onClose);

    await expect(connected.validateQuery(new FolQuery('((a) s.t. (p a))'))).rejects.toBeInstanceOf(
      ConnectionClosedError,
    );
    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(connected.connectionState).toBe('closed');
  });

  it('열려 있지 않은 포트에는 연결에 실패해야 합니다', async () => {
    const probe = await startServer(() => {});
    const port = probe.port;
    await stopServer(probe);

    await expect(
      TriggerwareClient.connect({ host: '127.0.0.1', port, logger: silentLogger() }),
    ).rejects.toThrow();
  });
});
