import { defaultRegistry } from '../registry/index.js';
import type { Registry } from '../registry/registry.js';
import type { Attachment, RenderedOutputs } from './attachment.js';
import { deliverOutputs } from './deliver.js';

/**
 * Attachment 묶음
 * text는 빈 줄로 이어 붙이고 images/audio는 순서대로 합친다 (비어 있으면 null).
 */
export class AttachmentCollection implements Iterable<Attachment>, RenderedOutputs {
  readonly items: readonly Attachment[];

  constructor(items: readonly Attachment[]) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  get text(): string | null {
    const parts = this.items
      .map((item) => item.text)
      .filter((text): text is string => text !== null && text !== '');
    return parts.length > 0 ? parts.join('\n\n') : null;
  }

  get images(): string[] | null {
    const all = this.items.flatMap((item) => item.images ?? []);
    return all.length > 0 ? all : null;
  }

  get audio(): string[] | null {
    const all = this.items.flatMap((item) => item.audio ?? []);
    return all.length > 0 ? all : null;
  }

  /** 원본 식별자 (쉼표로 연결) */
  get original(): string {
    return this.items.map((item) => item.original).join(', ');
  }

  outputs(): RenderedOutputs {
    return { text: this.text, images: this.images, audio: this.audio };
  }

  formatFor(style: string, prompt: string | null = null, registry: Registry = defaultRegistry): unknown {
    return deliverOutputs(registry, this, style, prompt);
  }

  [Symbol.iterator](): Iterator<Attachment> {
    return this.items[Symbol.iterator]();
  }
}
