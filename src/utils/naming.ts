/**
 * 서버 콜백 메서드 이름 할당기
 */

/**
 * 접두사별 카운터로 연결 내에서 유일한 메서드 이름을 발급합니다.
 * 클라이언트마다 하나씩 소유하며 전역 상태를 두지 않습니다.
 *
 * @example
 * ```typescript
 * const names = new MethodNameAllocator();
 * names.next('poll'); // 'poll0'
 * names.next('poll'); // 'poll1'
 * names.next('sub');  // 'sub0'
 * ```
 */
export class MethodNameAllocator {
  private counters = new Map<string, number>();

  next(prefix: string): string {
    const count = this.counters.get(prefix) ?? 0;
    this.counters.set(prefix, count + 1);
    return `${prefix}${count}`;
  }
}
