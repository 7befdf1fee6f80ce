/**
 * 파이프라인 합성 연산자
 *
 * orElse / anyOf: match()가 맞는 첫 번째 단계를 실행한다.
 * 다음 단계로 넘어가는 것은 match() 불일치뿐이며, 실행 중 예외는 그대로 전파된다.
 */

import type { Attachment } from '../attachment/attachment.js';
import { AttachkitError } from '../errors.js';
import type { Loader, Renderer, RenderMeta, RenderResult, StageContext } from '../plugin/types.js';

/**
 * 입력 일치 여부를 판단할 수 있는 단계
 */
export interface MatchableStage<I, O, A extends unknown[] = []> {
  readonly name: string;
  match(input: I): boolean;
  run(input: I, ...args: A): O | Promise<O>;
}

export type AttachmentStep = (attachment: Attachment) => Attachment | Promise<Attachment>;

/**
 * left가 일치하면 left, 아니면 right를 실행
 * (결합 법칙 성립: orElse(a, orElse(b, c)) ≡ orElse(orElse(a, b), c))
 */
export function orElse<I, O, A extends unknown[] = []>(
  left: MatchableStage<I, O, A>,
  right: MatchableStage<I, O, A>
): MatchableStage<I, O, A> {
  return anyOf(left, right);
}

/**
 * 일치하는 첫 번째 단계를 실행
 */
export function anyOf<I, O, A extends unknown[] = []>(
  ...stages: Array<MatchableStage<I, O, A>>
): MatchableStage<I, O, A> {
  if (stages.length === 0) {
    throw new TypeError('anyOf() requires at least one stage');
  }

  const name = stages.map((stage) => stage.name).join(' | ');

  return {
    name,
    match: (input) => stages.some((stage) => stage.match(input)),
    run: (input, ...args) => {
      const selected = stages.find((stage) => stage.match(input));
      if (!selected) {
        throw new AttachkitError(`No stage in '${name}' accepts the input`, {
          suggestion: 'Check match() of each alternative or add a fallback stage.',
        });
      }
      return selected.run(input, ...args);
    },
  };
}

/**
 * Attachment 단계를 왼쪽부터 순서대로 연결
 */
export function pipe(...steps: AttachmentStep[]): (attachment: Attachment) => Promise<Attachment> {
  return async (attachment) => {
    let current = attachment;
    for (const step of steps) {
      current = await step(current);
    }
    return current;
  };
}

/**
 * Loader를 합성 가능한 단계로 변환
 */
export function loaderStage<T>(loader: Loader<T>): MatchableStage<string, T, [StageContext]> {
  return {
    name: loader.name,
    match: (locator) => loader.match(locator),
    run: (locator, context) => loader.load(locator, context),
  };
}

/**
 * Renderer를 합성 가능한 단계로 변환
 */
export function rendererStage(renderer: Renderer): MatchableStage<unknown, RenderResult, [RenderMeta]> {
  return {
    name: renderer.name,
    match: (payload) => renderer.match(payload),
    run: (payload, meta) => renderer.render(payload, meta),
  };
}

/**
 * 합성된 단계를 다시 Loader로 변환 (레지스트리에 등록 가능)
 */
export function toLoader<T>(stage: MatchableStage<string, T, [StageContext]>): Loader<T> {
  return {
    name: stage.name,
    match: (locator) => stage.match(locator),
    load: (locator, context) => stage.run(locator, context),
  };
}
