/**
 * Attachment - 파이프라인을 통과하는 작업 단위
 *
 * 식별자마다 한 번 생성되고 단계별로 content와 출력 슬롯이 교체된다.
 */

import type { CommandToken, ParsedIdentifier } from '../dsl/splitter.js';
import type { StageName } from '../errors.js';
import { defaultRegistry } from '../registry/index.js';
import type { Registry } from '../registry/registry.js';
import { deliverOutputs } from './deliver.js';

export type TraceOutcome = 'matched' | 'skipped' | 'applied' | 'ignored' | 'failed';

/**
 * 파이프라인 결정 기록 한 줄
 */
export interface TraceEntry {
  stage: StageName | 'dispatch';
  /** registry kind 또는 dispatch role */
  kind: string;
  plugin: string;
  outcome: TraceOutcome;
  detail?: string;
}

export interface AttachmentInit {
  original: string;
  path: string;
  tokens?: readonly CommandToken[];
  commands?: Readonly<Record<string, string>>;
  content?: unknown;
  meta?: Record<string, unknown>;
}

/**
 * 렌더링 결과 묶음 (Deliverer 입력)
 */
export interface RenderedOutputs {
  text: string | null;
  images: string[] | null;
  audio: string[] | null;
}

const OUTCOME_MARKS: Record<TraceOutcome, string> = {
  matched: '✓',
  applied: '✓',
  skipped: '✗',
  failed: '✗',
  ignored: '-',
};

export class Attachment implements RenderedOutputs {
  readonly original: string;
  readonly path: string;
  readonly tokens: readonly CommandToken[];
  readonly commands: Readonly<Record<string, string>>;
  content: unknown;
  text: string | null = null;
  images: string[] | null = null;
  audio: string[] | null = null;
  meta: Record<string, unknown>;
  readonly diagnostics: TraceEntry[] = [];

  constructor(init: AttachmentInit) {
    this.original = init.original;
    this.path = init.path;
    this.tokens = init.tokens ?? [];
    this.commands = init.commands ?? {};
    this.content = init.content;
    this.meta = init.meta ?? {};
  }

  static fromParsed(parsed: ParsedIdentifier, meta: Record<string, unknown> = {}): Attachment {
    return new Attachment({
      original: parsed.original,
      path: parsed.locator,
      tokens: parsed.tokens,
      commands: parsed.commands,
      meta,
    });
  }

  /**
   * 새 content를 가진 복사본 (source, commands, 출력 슬롯, 기록 유지)
   */
  withContent(content: unknown): Attachment {
    const next = new Attachment({
      original: this.original,
      path: this.path,
      tokens: this.tokens,
      commands: this.commands,
      content,
      meta: { ...this.meta },
    });
    next.text = this.text;
    next.images = this.images ? [...this.images] : null;
    next.audio = this.audio ? [...this.audio] : null;
    next.diagnostics.push(...this.diagnostics);
    return next;
  }

  trace(entry: TraceEntry): void {
    this.diagnostics.push(entry);
  }

  outputs(): RenderedOutputs {
    return { text: this.text, images: this.images, audio: this.audio };
  }

  /**
   * 등록된 Deliverer로 포장 (style은 대소문자 무시)
   */
  formatFor(style: string, prompt: string | null = null, registry: Registry = defaultRegistry): unknown {
    return deliverOutputs(registry, this, style, prompt);
  }

  /**
   * 결정 기록을 사람이 읽을 수 있는 텍스트로 출력
   *
   * @example
   * ```
   * Attachment 'report.txt[pages:1-3]'
   *   locator: report.txt
   *   tokens: pages:1-3
   *   loader: ✗ pdf, ✓ paged-text
   *   transform: ✓ pages(1-3)
   *   renderer_text: ✓ paged-text
   *   outputs: text=42 chars, images=0, audio=0
   * ```
   */
  debug(): string {
    const lines = [`Attachment '${this.original}'`, `  locator: ${this.path}`];

    const tokenText = this.tokens
      .map((token) => (token.argument === null ? token.name : `${token.name}:${token.argument}`))
      .join(', ');
    lines.push(`  tokens: ${tokenText || '(none)'}`);

    const groups = new Map<string, string[]>();
    for (const entry of this.diagnostics) {
      const label = entry.kind;
      const detail = entry.detail ? `(${entry.detail})` : '';
      const marks = groups.get(label) ?? [];
      marks.push(`${OUTCOME_MARKS[entry.outcome]} ${entry.plugin}${detail}`);
      groups.set(label, marks);
    }
    for (const [label, marks] of groups) {
      lines.push(`  ${label}: ${marks.join(', ')}`);
    }

    lines.push(
      `  outputs: text=${this.text === null ? 'none' : `${this.text.length} chars`}, images=${this.images?.length ?? 0}, audio=${this.audio?.length ?? 0}`
    );
    return lines.join('\n');
  }

  toString(): string {
    return this.text ?? '';
  }
}
