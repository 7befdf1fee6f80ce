/**
 * 합성 연산자 테스트
 */
import { describe, it, expect, vi } from 'vitest';
import { Attachment } from '../../src/attachment/attachment.js';
import { anyOf, loaderStage, orElse, pipe, toLoader, type MatchableStage } from '../../src/pipeline/compose.js';
import { defineLoader } from '../../src/plugin/define.js';
import type { StageContext } from '../../src/plugin/types.js';

function stage(name: string, accepts: (input: string) => boolean): MatchableStage<string, string> {
  return {
    name,
    match: accepts,
    run: (input) => `${name}(${input})`,
  };
}

const context: StageContext = {
  identifier: 'notes.md',
  locator: 'notes.md',
  tokens: [],
  commands: {},
  logger: console,
};

describe('orElse', () => {
  it('왼쪽만 일치하지 않으면 오른쪽과 동일하게 동작해야 한다', async () => {
    const a = stage('a', () => false);
    const b = stage('b', (input) => input.endsWith('.md'));
    const combined = orElse(a, b);

    for (const input of ['notes.md', 'data.bin']) {
      expect(combined.match(input)).toBe(b.match(input));
    }
    expect(await combined.run('notes.md')).toBe(await b.run('notes.md'));
  });

  it('왼쪽이 일치하면 왼쪽을 실행해야 한다', async () => {
    const combined = orElse(stage('a', () => true), stage('b', () => true));

    expect(await combined.run('x')).toBe('a(x)');
  });

  it('실행 중 예외는 오른쪽으로 넘어가지 않아야 한다', () => {
    const right = stage('right', () => true);
    const runRight = vi.spyOn(right, 'run');
    const left: MatchableStage<string, string> = {
      name: 'left',
      match: () => true,
      run: () => {
        throw new Error('payload failure');
      },
    };

    expect(() => orElse(left, right).run('x')).toThrow('payload failure');
    expect(runRight).not.toHaveBeenCalled();
  });

  it('결합 법칙이 성립해야 한다', async () => {
    const a = stage('a', (input) => input === 'a');
    const b = stage('b', (input) => input === 'b');
    const c = stage('c', () => true);

    const leftNested = orElse(orElse(a, b), c);
    const rightNested = orElse(a, orElse(b, c));

    for (const input of ['a', 'b', 'z']) {
      expect(await leftNested.run(input)).toBe(await rightNested.run(input));
    }
    expect(leftNested.name).toBe('a | b | c');
  });

  it('모두 불일치하면 실행 시 오류를 던져야 한다', () => {
    const combined = anyOf(stage('a', () => false), stage('b', () => false));

    expect(combined.match('x')).toBe(false);
    expect(() => combined.run('x')).toThrow("No stage in 'a | b' accepts the input");
  });
});

describe('loaderStage / toLoader', () => {
  it('합성한 Loader를 다시 Loader로 사용할 수 있어야 한다', async () => {
    const pdf = defineLoader('pdf', { match: (locator) => locator.endsWith('.pdf'), load: () => 'pdf' });
    const text = defineLoader('text', { match: () => true, load: (locator, ctx) => `text:${ctx.identifier}:${locator}` });

    const loader = toLoader(orElse(loaderStage(pdf), loaderStage(text)));

    expect(loader.name).toBe('pdf | text');
    expect(loader.match('notes.md')).toBe(true);
    expect(await loader.load('notes.md', context)).toBe('text:notes.md:notes.md');
  });
});

describe('pipe', () => {
  it('Attachment 단계를 왼쪽부터 연결해야 한다', async () => {
    const append = (suffix: string) => (attachment: Attachment): Attachment =>
      attachment.withContent(`${String(attachment.content)}${suffix}`);
    const run = pipe(append('-1'), async (attachment) => append('-2')(attachment));

    const result = await run(new Attachment({ original: 'x', path: 'x', content: 'start' }));

    expect(result.content).toBe('start-1-2');
  });
});
