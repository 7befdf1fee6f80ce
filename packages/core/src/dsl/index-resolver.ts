/**
 * Index Resolver - 페이지/항목 선택 표현식 해석
 *
 * 문법 (쉼표로 구분, 공백 무시):
 * - `n`     : 1-based 번호 → n-1
 * - `N`, `-1`: 마지막 항목
 * - `a-b`   : 1-based 닫힌 구간
 * - `:b`    : 처음 b개
 * - `a:`    : a번째부터 끝까지
 * - `-k:`   : 마지막 k개
 *
 * 빈 표현식은 전체 범위를 뜻한다. 비어있지 않은 표현식의 결과가 빈 배열이면
 * "아무것도 선택하지 않음"이며, 호출자는 이를 전체 선택과 혼동하면 안 된다.
 */

/**
 * 거부된 spec 사유
 */
export type RejectedSpecReason = 'malformed' | 'out-of-range';

export interface RejectedSpec {
  spec: string;
  reason: RejectedSpecReason;
}

export interface IndexSelection {
  /** 오름차순, 중복 없음, [0, total) 범위 */
  indices: number[];
  rejected: RejectedSpec[];
}

const SINGLE = /^\d+$/;
const RANGE = /^(\d+)-(\d+)$/;
const LEADING = /^:(\d*)$/;
const TRAILING = /^(\d+):$/;
const TAIL = /^-(\d+):$/;

function range(start: number, end: number): number[] {
  const output: number[] = [];
  for (let index = start; index < end; index += 1) {
    output.push(index);
  }
  return output;
}

function resolveSpec(spec: string, total: number): number[] | RejectedSpecReason {
  if (spec.toUpperCase() === 'N' || spec === '-1') {
    return total > 0 ? [total - 1] : 'out-of-range';
  }

  const tail = TAIL.exec(spec);
  if (tail) {
    const count = Number(tail[1]);
    if (count < 1) {
      return 'out-of-range';
    }
    return range(Math.max(0, total - count), total);
  }

  const leading = LEADING.exec(spec);
  if (leading) {
    const raw = leading[1] ?? '';
    const count = raw === '' ? total : Number(raw);
    return range(0, Math.min(count, total));
  }

  const trailing = TRAILING.exec(spec);
  if (trailing) {
    const start = Number(trailing[1]) - 1;
    if (start < 0 || start >= total) {
      return 'out-of-range';
    }
    return range(start, total);
  }

  const pair = RANGE.exec(spec);
  if (pair) {
    const start = Number(pair[1]) - 1;
    const end = Number(pair[2]) - 1;
    if (start < 0 || start >= total || start > end) {
      return 'out-of-range';
    }
    return range(start, Math.min(end + 1, total));
  }

  if (SINGLE.test(spec)) {
    const index = Number(spec) - 1;
    if (index < 0 || index >= total) {
      return 'out-of-range';
    }
    return [index];
  }

  return 'malformed';
}

/**
 * 선택 표현식을 해석하고 거부된 spec 목록을 함께 반환
 *
 * @param expr - 선택 표현식 (예: "1,3-5,N")
 * @param total - 전체 항목 수
 */
export function parseIndexExpression(expr: string, total: number): IndexSelection {
  const count = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  const compact = expr.replace(/\s+/g, '');

  if (compact === '') {
    return { indices: range(0, count), rejected: [] };
  }

  const selected = new Set<number>();
  const rejected: RejectedSpec[] = [];

  for (const spec of compact.split(',')) {
    if (spec === '') {
      continue;
    }
    const resolved = resolveSpec(spec, count);
    if (typeof resolved === 'string') {
      rejected.push({ spec, reason: resolved });
      continue;
    }
    for (const index of resolved) {
      selected.add(index);
    }
  }

  const indices = Array.from(selected)
    .filter((index) => index >= 0 && index < count)
    .sort((a, b) => a - b);

  return { indices, rejected };
}

/**
 * 선택 표현식을 0-based 인덱스 목록으로 변환
 * 잘못된 spec은 경고 후 무시한다 (예외를 던지지 않음).
 *
 * @param expr - 선택 표현식
 * @param total - 전체 항목 수
 * @param logger - 경고 출력용 logger
 */
export function resolveIndices(expr: string, total: number, logger?: Console): number[] {
  const { indices, rejected } = parseIndexExpression(expr, total);
  for (const item of rejected) {
    logger?.warn?.(`Ignoring ${item.reason} index spec '${item.spec}' (total: ${total})`);
  }
  return indices;
}
