/**
 * Pipeline Orchestrator 테스트
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { resolveIndices } from '../../src/dsl/index-resolver.js';
import { CommandSyntaxError, NoLoaderError, StageError } from '../../src/errors.js';
import { Pipeline } from '../../src/pipeline/orchestrator.js';
import { defineDeliverer, defineLoader, defineRenderer, defineTransform } from '../../src/plugin/define.js';
import { Registry } from '../../src/registry/registry.js';
import { createTestLogger } from '../helpers.js';

interface Doc {
  pages: string[];
}

function isDoc(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && 'pages' in value && Array.isArray(value.pages);
}

const docLoader = defineLoader('doc', {
  match: () => true,
  load: (): Doc => ({ pages: ['p1', 'p2', 'p3', 'p4', 'p5'] }),
});

const pagesTransform = defineTransform('pages', (payload, argument) => {
  if (!isDoc(payload)) {
    return payload;
  }
  const indices = resolveIndices(argument ?? '', payload.pages.length);
  return { pages: indices.map((index) => payload.pages[index] ?? '') };
});

const joinRenderer = defineRenderer('join', 'text', {
  match: isDoc,
  render: (payload) => (isDoc(payload) ? payload.pages.join('|') : ''),
});

describe('Pipeline', () => {
  let registry: Registry;
  let pipeline: Pipeline;

  beforeEach(() => {
    const { logger } = createTestLogger();
    registry = new Registry({ logger });
    pipeline = new Pipeline({ registry, logger });
  });

  it('DSL로 선택한 페이지만 렌더링해야 한다', async () => {
    registry.register('loader', docLoader);
    registry.register('transform', pagesTransform);
    registry.register('renderer_text', joinRenderer);

    const attachment = await pipeline.run('report[pages:1-3]');

    expect(attachment.path).toBe('report');
    expect(attachment.text).toBe('p1|p2|p3');
    expect(attachment.images).toBeNull();
    expect(attachment.audio).toBeNull();
  });

  it('높은 priority의 Loader를 사용해야 한다', async () => {
    registry.register('loader', defineLoader('low', { match: () => true, load: () => 'low' }), 10);
    registry.register('loader', defineLoader('high', { match: () => true, load: async () => 'high' }), 20);

    const attachment = await pipeline.run('a.txt');

    expect(attachment.content).toBe('high');
  });

  it('일치하는 Loader가 없으면 NoLoaderError를 던져야 한다', async () => {
    registry.register('loader', defineLoader('pdf', { match: (locator) => locator.endsWith('.pdf'), load: () => '' }));

    await expect(pipeline.run('x.bin[pages:1]')).rejects.toThrow(NoLoaderError);
    await expect(pipeline.run('x.bin[pages:1]')).rejects.toThrow(
      "No loader registered for 'x.bin' (identifier: x.bin[pages:1], stage: load, kind: loader)"
    );
  });

  it('Loader 예외는 식별자, 단계, kind를 담은 StageError로 감싸야 한다', async () => {
    const cause = new Error('disk on fire');
    registry.register(
      'loader',
      defineLoader('fragile', {
        match: () => true,
        load: () => {
          throw cause;
        },
      })
    );

    const error = await pipeline.run('a.txt').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageError);
    if (error instanceof StageError) {
      expect(error.message).toBe("load failed for 'a.txt' in loader 'fragile': disk on fire");
      expect(error.stage).toBe('load');
      expect(error.errorCause).toBe(cause);
    }
  });

  it('알 수 없는 토큰은 무시하고 기록해야 한다', async () => {
    registry.register('loader', docLoader);

    const attachment = await pipeline.run('a[nothing:1,flag]');

    expect(attachment.content).toEqual({ pages: ['p1', 'p2', 'p3', 'p4', 'p5'] });
    expect(attachment.diagnostics.filter((entry) => entry.outcome === 'ignored').map((entry) => entry.plugin)).toEqual([
      'nothing',
      'flag',
    ]);
  });

  it('Transform은 DSL 순서대로 적용되어야 한다', async () => {
    registry.register('loader', defineLoader('text', { match: () => true, load: () => 'a' }));
    registry.register('transform', defineTransform('add', (payload, argument) => `${String(payload)}${argument ?? ''}`));
    registry.register('transform', defineTransform('wrap', (payload) => `(${String(payload)})`));

    const attachment = await pipeline.run('x[add:b,wrap,add:c]');

    expect(attachment.content).toBe('(ab)c');
  });

  it('호출된 Transform이 실패하면 낮은 priority로 대체하지 않아야 한다', async () => {
    const fallback = vi.fn((payload: unknown) => payload);
    registry.register('loader', docLoader);
    registry.register(
      'transform',
      defineTransform('pages', () => {
        throw new Error('bad range');
      }),
      50
    );
    registry.register('transform', defineTransform('pages', fallback), 10);

    await expect(pipeline.run('a[pages:1]')).rejects.toThrow(
      "transform failed for 'a[pages:1]' in transform 'pages': bad range"
    );
    expect(fallback).not.toHaveBeenCalled();
  });

  it('match()가 예외를 던지는 Renderer는 불일치로 처리해야 한다', async () => {
    registry.register('loader', docLoader);
    registry.register(
      'renderer_text',
      defineRenderer('broken', 'text', {
        match: () => {
          throw new Error('cannot inspect');
        },
        render: () => 'never',
      }),
      90
    );
    registry.register('renderer_text', joinRenderer, 10);

    const attachment = await pipeline.run('a');

    expect(attachment.text).toBe('p1|p2|p3|p4|p5');
    expect(attachment.debug().split('\n')).toContain('  renderer_text: ✗ broken, ✓ join');
  });

  it('출력 종류마다 독립적으로 Renderer를 선택해야 한다', async () => {
    registry.register('loader', docLoader);
    registry.register('renderer_text', joinRenderer);
    registry.register('renderer_image', defineRenderer('cover', 'image', { render: () => 'data:image/png;base64,AA==' }));
    registry.register('renderer_audio', defineRenderer('silent', 'audio', { match: () => false, render: () => [] }));

    const attachment = await pipeline.run('a');

    expect(attachment.text).toBe('p1|p2|p3|p4|p5');
    expect(attachment.images).toEqual(['data:image/png;base64,AA==']);
    expect(attachment.audio).toBeNull();
  });

  it('contentType이 다른 Renderer는 건너뛰어야 한다', async () => {
    registry.register('loader', docLoader);
    registry.register('renderer_text', defineRenderer('misfiled', 'image', { render: () => 'img' }));

    const attachment = await pipeline.run('a');

    expect(attachment.text).toBeNull();
  });

  it('raw 옵션은 식별자를 분리하지 않아야 한다', async () => {
    const load = vi.fn((locator: string) => locator);
    registry.register('loader', defineLoader('echo', { match: () => true, load }));

    const attachment = await pipeline.run('data[v1].txt[x]', { raw: true });

    expect(attachment.path).toBe('data[v1].txt[x]');
    expect(attachment.tokens).toEqual([]);
    expect(load.mock.calls[0]?.[0]).toBe('data[v1].txt[x]');
  });

  it('strict 모드에서는 잘못된 토큰이 CommandSyntaxError여야 한다', async () => {
    const strictPipeline = new Pipeline({ registry, strict: true });
    registry.register('loader', docLoader);

    await expect(strictPipeline.run('a.txt[:oops]')).rejects.toThrow(CommandSyntaxError);
  });

  it('runMany()와 deliver()는 결과를 합쳐 포장해야 한다', async () => {
    registry.register('loader', defineLoader('text', { match: () => true, load: (locator) => locator }));
    registry.register('renderer_text', defineRenderer('plain', 'text', { render: (payload) => `<${String(payload)}>` }));
    registry.register(
      'deliverer',
      defineDeliverer('bundle', (text, _images, _audio, prompt) => ({ prompt, text }))
    );

    const collection = await pipeline.runMany(['a.txt', 'b.txt']);

    expect(collection.text).toBe('<a.txt>\n\n<b.txt>');
    expect(pipeline.deliver(collection, 'Bundle', 'summarize')).toEqual({
      prompt: 'summarize',
      text: '<a.txt>\n\n<b.txt>',
    });
  });
});
