/**
 * Deliver 단계
 */

import { NoDelivererError, StageError } from '../errors.js';
import type { Registry } from '../registry/registry.js';
import type { RenderedOutputs } from './attachment.js';

export interface Deliverable {
  readonly original: string;
  outputs(): RenderedOutputs;
}

/**
 * style 이름(대소문자 무시)의 Deliverer로 렌더링 결과를 포장
 */
export function deliverOutputs(
  registry: Registry,
  target: Deliverable,
  style: string,
  prompt: string | null = null
): unknown {
  const wanted = style.toLowerCase();
  const deliverer = registry.first('deliverer', (candidate) => candidate.name === wanted);
  if (!deliverer) {
    throw new NoDelivererError(
      style,
      registry.all('deliverer').map((candidate) => candidate.name)
    );
  }

  const { text, images, audio } = target.outputs();
  try {
    return deliverer.package(text, images, audio, prompt);
  } catch (error) {
    throw new StageError({
      identifier: target.original,
      stage: 'deliver',
      kind: 'deliverer',
      plugin: deliverer.name,
      cause: error,
    });
  }
}
