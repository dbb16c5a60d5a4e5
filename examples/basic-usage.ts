/**
 * triggerware-client 기본 사용 예제
 *
 * 사전 요구사항:
 * - Triggerware 서버 실행 중 (기본: localhost:5221, TRIGGERWARE_HOST/TRIGGERWARE_PORT로 변경)
 *
 * 실행: npx tsx examples/basic-usage.ts
 */

import { CalendarSchedule, FolQuery, SqlQuery, TriggerwareClient } from '../src/index.js';

async function main() {
  const client = await TriggerwareClient.connect();

  client.on('stateChange', (state) => {
    console.log(`[상태] ${state}`);
  });
  client.on('protocolError', (error: Error) => {
    console.error(`[프로토콜] ${error.message}`);
  });

  try {
    // ── 1. 쿼리 실행 ──
    console.log('📊 쿼리 실행');
    const inflation = await client.executeQuery(
      new FolQuery('((a) s.t. (inflation 1991 1995 a))'),
    );
    console.log('  시그니처:', inflation.signature.map((s) => s.attribute).join(', '));
    for await (const row of inflation) {
      console.log('  ', row);
    }

    // ── 2. 준비된 쿼리 ──
    console.log('\n🧩 준비된 쿼리');
    const prepared = await client.prepareQuery(
      new SqlQuery('SELECT * FROM inflation WHERE year1 = ?1 AND year2 = ?2'),
    );
    prepared.setParameter(0, 1991);
    prepared.setParameter(1, 1995);
    const rows = await (await prepared.execute({ rowLimit: 10 })).pull(10);
    console.log(`  ${rows.length}개 행`);

    // ── 3. 폴링 쿼리 ──
    console.log('\n⏱️  폴링 쿼리 (매 분)');
    const polled = await client.createPolledQuery(
      new FolQuery('((a) s.t. (inflation 1991 1995 a))'),
      {
        handleNotification(added, deleted) {
          console.log(`  +${added.length} -${deleted.length}`);
        },
        handleError(error) {
          console.error(`  폴링 실패: ${error.message}`);
        },
      },
      {
        schedule: new CalendarSchedule({ minutes: '*', timezone: 'UTC' }),
        controls: { reportInitial: 'with delta' },
      },
    );
    await polled.pollNow();

    // ── 4. 관계 메타데이터 ──
    console.log('\n📚 관계 목록');
    for (const group of await client.getRelData()) {
      console.log(`  ${group.name} (${group.elements.length})`);
    }

    await new Promise((resolve) => setTimeout(resolve, 5_000));
  } finally {
    client.close();
    console.log('\n👋 연결 종료');
  }
}

main().catch(console.error);
