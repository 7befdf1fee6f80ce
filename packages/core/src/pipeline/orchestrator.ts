/**
 * Pipeline Orchestrator - 변환 파이프라인 실행 엔진
 *
 * Split → Load(필수) → Transform*(DSL 순서) → Render(kind별 0..n) → Deliver(선택)
 *
 * 각 단계는 동기 또는 비동기 플러그인을 받으며, 다음 단계 전에 항상 await 한다.
 * 플러그인이 한 번 호출된 뒤에는 낮은 priority 플러그인으로 대체 실행하지 않는다.
 */

import { Attachment } from '../attachment/attachment.js';
import { AttachmentCollection } from '../attachment/collection.js';
import { deliverOutputs } from '../attachment/deliver.js';
import { parseIdentifier } from '../dsl/splitter.js';
import { NoLoaderError, StageError } from '../errors.js';
import type { ContentType, RenderResult, StageContext } from '../plugin/types.js';
import { CONTENT_TYPES, rendererKind } from '../plugin/types.js';
import { defaultRegistry } from '../registry/index.js';
import type { Registry } from '../registry/registry.js';
import { errorMessage } from '../utils.js';

export interface PipelineOptions {
  registry?: Registry;
  logger?: Console;
  /** 잘못된 명령 토큰에서 CommandSyntaxError를 던짐 */
  strict?: boolean;
}

export interface RunOptions {
  /** 식별자를 분리하지 않고 통째로 locator로 사용 */
  raw?: boolean;
  /** Renderer에 전달할 추가 메타데이터 */
  meta?: Record<string, unknown>;
}

function toList(result: RenderResult): string[] {
  return typeof result === 'string' ? [result] : [...result];
}

function toText(result: RenderResult): string {
  return typeof result === 'string' ? result : result.join('\n\n');
}

/**
 * 변환 파이프라인
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline({ registry });
 * const attachment = await pipeline.run('report.txt[pages:1-3]');
 * const payload = pipeline.deliver(attachment, 'openai', 'Summarize this');
 * ```
 */
export class Pipeline {
  readonly registry: Registry;
  private readonly logger: Console;
  private readonly strict: boolean;

  constructor(options: PipelineOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.logger = options.logger ?? console;
    this.strict = options.strict ?? false;
  }

  /**
   * Split: 식별자 → 빈 Attachment
   */
  split(identifier: string, options: RunOptions = {}): Attachment {
    if (options.raw) {
      return new Attachment({ original: identifier, path: identifier, meta: options.meta });
    }
    const parsed = parseIdentifier(identifier, { strict: this.strict, logger: this.logger });
    return Attachment.fromParsed(parsed, options.meta);
  }

  /**
   * Load: locator와 일치하는 첫 번째 Loader로 content를 채움
   */
  async load(attachment: Attachment): Promise<Attachment> {
    const locator = attachment.path;
    const loader = this.registry.first('loader', (candidate) => {
      const matched = this.tryMatch(() => candidate.match(locator));
      attachment.trace({
        stage: 'load',
        kind: 'loader',
        plugin: candidate.name,
        outcome: matched ? 'matched' : 'skipped',
      });
      return matched;
    });

    if (!loader) {
      throw new NoLoaderError(locator, attachment.original);
    }

    try {
      attachment.content = await loader.load(locator, this.context(attachment));
    } catch (error) {
      throw new StageError({
        identifier: attachment.original,
        stage: 'load',
        kind: 'loader',
        plugin: loader.name,
        cause: error,
      });
    }

    this.logger.debug?.(`Loaded '${locator}' with loader ${loader.name}`);
    return attachment;
  }

  /**
   * Transform: DSL 토큰 순서대로 이름이 같은 Transform 적용
   * 일치하는 Transform이 없는 토큰은 무시한다.
   */
  async transform(attachment: Attachment): Promise<Attachment> {
    for (const token of attachment.tokens) {
      const transform = this.registry.first('transform', (candidate) => candidate.name === token.name);
      if (!transform) {
        attachment.trace({ stage: 'transform', kind: 'transform', plugin: token.name, outcome: 'ignored' });
        continue;
      }

      try {
        attachment.content = await transform.apply(attachment.content, token.argument, this.context(attachment));
      } catch (error) {
        attachment.trace({
          stage: 'transform',
          kind: 'transform',
          plugin: transform.name,
          outcome: 'failed',
        });
        throw new StageError({
          identifier: attachment.original,
          stage: 'transform',
          kind: 'transform',
          plugin: transform.name,
          cause: error,
        });
      }

      attachment.trace({
        stage: 'transform',
        kind: 'transform',
        plugin: transform.name,
        outcome: 'applied',
        detail: token.argument ?? undefined,
      });
    }
    return attachment;
  }

  /**
   * Render: 출력 종류(text, image, audio)마다 독립적으로 첫 번째 Renderer 실행
   */
  async render(attachment: Attachment): Promise<Attachment> {
    for (const contentType of CONTENT_TYPES) {
      await this.renderKind(attachment, contentType);
    }
    return attachment;
  }

  /**
   * Split → Load → Transform → Render
   */
  async run(identifier: string, options: RunOptions = {}): Promise<Attachment> {
    const attachment = this.split(identifier, options);
    await this.load(attachment);
    await this.transform(attachment);
    await this.render(attachment);
    return attachment;
  }

  /**
   * 여러 식별자를 순서대로 실행
   */
  async runMany(identifiers: readonly string[], options: RunOptions = {}): Promise<AttachmentCollection> {
    const attachments: Attachment[] = [];
    for (const identifier of identifiers) {
      attachments.push(await this.run(identifier, options));
    }
    return new AttachmentCollection(attachments);
  }

  /**
   * Deliver: style 이름의 Deliverer로 렌더링 결과를 포장
   */
  deliver(
    target: Attachment | AttachmentCollection,
    style: string,
    prompt: string | null = null
  ): unknown {
    return deliverOutputs(this.registry, target, style, prompt);
  }

  private async renderKind(attachment: Attachment, contentType: ContentType): Promise<void> {
    const kind = rendererKind(contentType);
    const payload = attachment.content;

    const renderer = this.registry.first(kind, (candidate) => {
      const matched =
        candidate.contentType === contentType && this.tryMatch(() => candidate.match(payload));
      attachment.trace({
        stage: 'render',
        kind,
        plugin: candidate.name,
        outcome: matched ? 'matched' : 'skipped',
      });
      return matched;
    });

    if (!renderer) {
      return;
    }

    let result: RenderResult;
    try {
      result = await renderer.render(payload, { ...this.context(attachment), meta: attachment.meta });
    } catch (error) {
      throw new StageError({
        identifier: attachment.original,
        stage: 'render',
        kind,
        plugin: renderer.name,
        cause: error,
      });
    }

    if (contentType === 'text') {
      attachment.text = toText(result);
    } else if (contentType === 'image') {
      attachment.images = toList(result);
    } else {
      attachment.audio = toList(result);
    }
  }

  /**
   * match()가 던진 예외는 불일치로 처리
   */
  private tryMatch(match: () => boolean): boolean {
    try {
      return match();
    } catch (error) {
      this.logger.debug?.(`match() threw, treating as no match: ${errorMessage(error)}`);
      return false;
    }
  }

  private context(attachment: Attachment): StageContext {
    return {
      identifier: attachment.original,
      locator: attachment.path,
      tokens: attachment.tokens,
      commands: attachment.commands,
      logger: this.logger,
    };
  }
}
