/**
 * ResultSet 테스트
 * 캐시 소비, 배치 조회, 소진 처리를 검증합니다.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TriggerwareClient } from '../../src/client/TriggerwareClient.js';
import { RpcError, ServerError } from '../../src/errors/RpcErrors.js';
import { FolQuery } from '../../src/query/Query.js';
import { ResultSet } from '../../src/query/ResultSet.js';
import { createFakeServer, silentLogger, type FakeServer } from '../helpers/fakeServer.js';

describe('ResultSet', () => {
  let server: FakeServer;
  let client: TriggerwareClient;

  beforeEach(async () => {
    server = await createFakeServer();
    client = new TriggerwareClient(server.connection, { fetchSize: 2, logger: silentLogger() });
  });

  afterEach(() => {
    client.close();
  });

  it('inflation 쿼리를 pull(1) 두 번 하면 배치 조회는 정확히 한 번이어야 합니다', async () => {
    const pending = client.executeQuery(new FolQuery('((a) s.t. (inflation 1991 1995 a))'));
    const execute = await server.waitForRequest('execute-query');
    expect(execute.params).toEqual({
      query: '((a) s.t. (inflation 1991 1995 a))',
      language: 'fol',
      namespace: 'AP5',
    });
    server.reply(execute, {
      handle: 1,
      signature: [{ attribute: 'a', type: 'double' }],
      batch: { tuples: [], exhausted: false },
    });
    const rows = await pending;

    const first = rows.pull(1);
    const fetch = await server.waitForRequest('next-resultset-batch');
    expect(fetch.params).toEqual([1, 2, null]);
    server.reply(fetch, { batch: { tuples: [[1.5], [2.5]], exhausted: false } });

    expect(await first).toEqual([[1.5]]);
    expect(await rows.pull(1)).toEqual([[2.5]]);
    expect(server.requests('next-resultset-batch')).toHaveLength(1);
    expect(rows.signature).toEqual([{ attribute: 'a', type: 'double' }]);
  });

  it('핸들이 없으면 첫 배치만 읽고 끝나야 합니다', async () => {
    const rows = new ResultSet(client, { batch: { tuples: [[1], [2]] } });

    expect(rows.exhausted).toBe(true);
    expect(await rows.pull(5)).toEqual([[1], [2]]);
    expect(server.sent).toEqual([]);
  });

  it('서버가 소진을 알리면 더 이상 조회하지 않아야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 3, batch: { tuples: [[1]], exhausted: false } });

    const pulled = rows.pull(3);
    const fetch = await server.waitForRequest('next-resultset-batch');
    server.reply(fetch, { batch: { tuples: [[2]], exhausted: true } });

    expect(await pulled).toEqual([[1], [2]]);
    expect(rows.exhausted).toBe(true);
    expect(await rows.pull(1)).toEqual([]);
    expect(server.requests('next-resultset-batch')).toHaveLength(1);
  });

  it('빈 배치를 받으면 반복이 끝나고 소진 상태가 되어야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 4, batch: { tuples: [], exhausted: false } });

    const next = rows.next();
    server.reply(await server.waitForRequest('next-resultset-batch'), {
      batch: { tuples: [], exhausted: false },
    });

    expect(await next).toEqual({ done: true, value: undefined });
    expect(rows.exhausted).toBe(true);
    expect(await rows.next()).toEqual({ done: true, value: undefined });
    expect(server.requests('next-resultset-batch')).toHaveLength(1);
  });

  it('동시에 호출된 next()는 배치 조회를 겹치지 않아야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 5 });

    const a = rows.next();
    const b = rows.next();
    const fetch = await server.waitForRequest('next-resultset-batch');
    server.reply(fetch, { batch: { tuples: [['x'], ['y']], exhausted: true } });

    expect(await a).toEqual({ done: false, value: ['x'] });
    expect(await b).toEqual({ done: false, value: ['y'] });
    expect(server.requests('next-resultset-batch')).toHaveLength(1);
  });

  it('for await로 모든 행을 순회할 수 있어야 합니다', async () => {
    const rows = new ResultSet(client, { handle: null, batch: { tuples: [[1], [2], [3]] } });

    const seen: unknown[] = [];
    for await (const row of rows) {
      seen.push(row);
    }

    expect(seen).toEqual([[1], [2], [3]]);
  });

  it('옵션의 rowLimit과 timeout으로 배치를 조회해야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 9 }, { rowLimit: 50, timeout: 3 });

    const next = rows.next();
    const fetch = await server.waitForRequest('next-resultset-batch');
    server.reply(fetch, { batch: { tuples: [[0]], exhausted: true } });

    expect(fetch.params).toEqual([9, 50, 3]);
    expect(await next).toEqual({ done: false, value: [0] });
  });

  it('batch가 없는 응답은 ServerError여야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 6 });

    const next = rows.next();
    server.reply(await server.waitForRequest('next-resultset-batch'), {});

    await expect(next).rejects.toThrow(ServerError);
  });

  it('조회 실패 후에도 다음 호출은 다시 조회해야 합니다', async () => {
    const rows = new ResultSet(client, { handle: 7 });

    const failed = rows.next();
    server.replyError(await server.waitForRequest('next-resultset-batch'), -32602, '잘못된 핸들');
    await expect(failed).rejects.toBeInstanceOf(RpcError);

    const retried = rows.next();
    server.reply(await server.waitForRequest('next-resultset-batch', 2), {
      batch: { tuples: [['ok']], exhausted: true },
    });

    expect(await retried).toEqual({ done: false, value: ['ok'] });
  });
});
