/**
 * PreparedQuery 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TriggerwareClient } from '../../src/client/TriggerwareClient.js';
import { RpcError } from '../../src/errors/RpcErrors.js';
import { PreparedQueryError } from '../../src/errors/TriggerwareErrors.js';
import { PreparedQuery } from '../../src/query/PreparedQuery.js';
import { FolQuery, SqlQuery } from '../../src/query/Query.js';
import type { Query } from '../../src/types/query.js';
import { createFakeServer, silentLogger, type FakeServer } from '../helpers/fakeServer.js';

const POSITIONAL = {
  handle: 11,
  inputSignature: [
    { attribute: '?1', type: 'integer' },
    { attribute: '?2', type: 'stringcase' },
  ],
  usesNamedParameters: false,
};

describe('PreparedQuery', () => {
  let server: FakeServer;
  let client: TriggerwareClient;

  beforeEach(async () => {
    server = await createFakeServer();
    client = new TriggerwareClient(server.connection, { logger: silentLogger() });
  });

  afterEach(() => {
    client.close();
  });

  async function prepare(
    query: Query = new SqlQuery('SELECT * FROM t WHERE a = ?1 AND b = ?2'),
    registration: unknown = POSITIONAL,
  ): Promise<PreparedQuery> {
    const pending = client.prepareQuery(query);
    server.reply(await server.waitForRequest('prepare-query'), registration);
    return pending;
  }

  describe('create', () => {
    it('prepare-query로 등록하고 핸들을 기록해야 합니다', async () => {
      const prepared = await prepare();

      expect(server.requests('prepare-query')[0].params).toEqual({
        query: 'SELECT * FROM t WHERE a = ?1 AND b = ?2',
        language: 'sql',
        namespace: 'AP5',
      });
      expect(prepared.handle).toBe(11);
      expect(prepared.parameterNames).toEqual(['?1', '?2']);
      expect(client.handles).toEqual([11]);
    });

    it('서버가 거부하면 PreparedQueryError여야 합니다', async () => {
      const pending = client.prepareQuery(new SqlQuery('SELEC'));
      server.replyError(await server.waitForRequest('prepare-query'), -32602, 'syntax error');

      const error = await pending.catch((err: unknown) => err);
      expect(error).toBeInstanceOf(PreparedQueryError);
      expect(error).toMatchObject({ message: 'syntax error' });
      expect(error instanceof PreparedQueryError && error.cause).toBeInstanceOf(RpcError);
    });
  });

  describe('setParameter / getParameter', () => {
    it('위치로 값을 설정하고 읽을 수 있어야 합니다', async () => {
      const prepared = await prepare();

      prepared.setParameter(0, 1991);

      expect(prepared.getParameter(0)).toBe(1991);
      expect(prepared.getParameter(1)).toBeNull();
    });

    it('위치 기반 쿼리에 이름을 쓰면 에러여야 합니다', async () => {
      const prepared = await prepare();

      expect(() => prepared.setParameter('?1', 1)).toThrow('위치 기반 파라미터를 사용하는 쿼리입니다');
      expect(() => prepared.getParameter('?1')).toThrow(PreparedQueryError);
    });

    it('범위를 벗어난 위치는 에러여야 합니다', async () => {
      const prepared = await prepare();

      expect(() => prepared.setParameter(5, 1)).toThrow('잘못된 파라미터 이름 또는 위치: 5');
      expect(() => prepared.getParameter(-1)).toThrow(PreparedQueryError);
    });

    it('SQL 쿼리는 시그니처 타입과 다른 값을 거부해야 합니다', async () => {
      const prepared = await prepare();

      expect(() => prepared.setParameter(0, '1991')).toThrow(
        'integer 타입이 필요하지만 string 값을 받았습니다',
      );
      expect(() => prepared.setParameter(0, 19.5)).toThrow(PreparedQueryError);
      expect(() => prepared.setParameter(1, 7)).toThrow('stringcase 타입이 필요하지만 number 값을 받았습니다');
    });

    it('알 수 없는 SQL 타입은 검사하지 않아야 합니다', async () => {
      const prepared = await prepare(new SqlQuery('SELECT ?1'), {
        handle: 12,
        inputSignature: [{ attribute: '?1', type: 'geometry' }],
        usesNamedParameters: false,
      });

      prepared.setParameter(0, { x: 1 });

      expect(prepared.getParameter(0)).toEqual({ x: 1 });
    });

    it('이름 기반 쿼리는 이름으로만 접근해야 하며 FOL은 타입을 검사하지 않아야 합니다', async () => {
      const prepared = await prepare(new FolQuery('((x) s.t. (inflation ?year 1995 x))'), {
        handle: 13,
        inputSignature: [{ attribute: 'year', type: 'integer' }],
        usesNamedParameters: true,
      });

      prepared.setParameter('year', 'not-a-number');

      expect(prepared.getParameter('year')).toBe('not-a-number');
      expect(() => prepared.setParameter(0, 1991)).toThrow('이름 기반 파라미터를 사용하는 쿼리입니다');
      expect(() => prepared.getParameter('month')).toThrow('잘못된 파라미터 이름 또는 위치: month');
    });
  });

  describe('execute', () => {
    it('현재 파라미터와 제한으로 create-resultset을 호출해야 합니다', async () => {
      const prepared = await prepare();
      prepared.setParameter(0, 1991);
      prepared.setParameter(1, 'abc');

      const pending = prepared.execute({ rowLimit: 10, timeout: 2 });
      const request = await server.waitForRequest('create-resultset');
      server.reply(request, { handle: null, batch: { tuples: [[1991, 'abc']] } });
      const rows = await pending;

      expect(request.params).toEqual({ handle: 11, inputs: [1991, 'abc'], limit: 10, timelimit: 2 });
      expect(await rows.pull(10)).toEqual([[1991, 'abc']]);
    });

    it('실행 에러는 PreparedQueryError로 감싸야 합니다', async () => {
      const prepared = await prepare();

      const pending = prepared.execute();
      server.replyError(await server.waitForRequest('create-resultset'), -32602, 'missing input');

      await expect(pending).rejects.toBeInstanceOf(PreparedQueryError);
    });
  });

  describe('clone', () => {
    it('새로 준비된 쿼리에 파라미터 값을 복사해야 합니다', async () => {
      const prepared = await prepare();
      prepared.setParameter(0, 2001);

      const pending = prepared.clone();
      const request = await server.waitForRequest('prepare-query', 2);
      server.reply(request, { ...POSITIONAL, handle: 21 });
      const copy = await pending;

      expect(request.params).toEqual(server.requests('prepare-query')[0].params);
      expect(copy.handle).toBe(21);
      expect(copy.getParameter(0)).toBe(2001);

      copy.setParameter(0, 2002);
      expect(prepared.getParameter(0)).toBe(2001);
      expect(client.handles).toEqual([11, 21]);
    });
  });
});
