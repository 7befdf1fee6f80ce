import { Attachment } from '../attachment/attachment.js';
import type { Dispatcher } from './dispatcher.js';

/**
 * 디스패처를 파이프라인 단계로 감싼 함수
 *
 * Attachment를 받으면 content를 꺼내 디스패치하고 결과를 새 Attachment로 다시 감싼다.
 * 그 외 입력은 디스패치 결과를 그대로 반환한다.
 */
export interface DispatchStage<A extends unknown[], R> {
  (input: Attachment, ...args: A): Promise<Attachment>;
  (input: unknown, ...args: A): Promise<Awaited<R>>;
  readonly role: string;
}

export function dispatchStage<A extends unknown[], R>(dispatcher: Dispatcher<A, R>): DispatchStage<A, R> {
  function stage(input: Attachment, ...args: A): Promise<Attachment>;
  function stage(input: unknown, ...args: A): Promise<Awaited<R>>;
  async function stage(input: unknown, ...args: A): Promise<Attachment | Awaited<R>> {
    if (!(input instanceof Attachment)) {
      return await dispatcher.dispatch(input, ...args);
    }

    const selection = dispatcher.select(input.content);
    const result = await dispatcher.dispatch(input.content, ...args);
    const next = input.withContent(result);
    next.trace({
      stage: 'dispatch',
      kind: dispatcher.role,
      plugin: selection?.implementation.name ?? '?',
      outcome: 'applied',
      detail: selection?.reason,
    });
    return next;
  }

  return Object.assign(stage, { role: dispatcher.role });
}
