/**
 * 기본 플러그인 등록 + Pipeline 통합 테스트
 */
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  NoLoaderError,
  Pipeline,
  Registry,
  StageError,
  createPluginApi,
  defaultConfig,
  describeRegistry,
  type PluginApi,
} from '@attachkit/core';
import { LOADER_PRIORITIES, registerBasePlugins, type BasePluginOptions } from '../src/register.js';
import { createTempWorkspace, createTestLogger, type TempWorkspace, type TestLogger } from './helpers.js';

const withPdf: BasePluginOptions = {
  pdf: { extract: async () => ['first', 'second'], gate: { probe: () => true } },
};

describe('registerBasePlugins', () => {
  let workspace: TempWorkspace;
  let log: TestLogger;
  let registry: Registry;
  let pipeline: Pipeline;

  function setup(options: BasePluginOptions = withPdf, api?: PluginApi): void {
    registerBasePlugins(api ?? createPluginApi({ registry, logger: log.logger }), options);
  }

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    log = createTestLogger();
    registry = new Registry({ logger: log.logger });
    pipeline = new Pipeline({ registry, logger: log.logger });
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('loader를 정해진 priority로 등록해야 한다', () => {
    setup();

    const loaders = describeRegistry(registry).kinds.find((entry) => entry.kind === 'loader');
    expect(loaders?.entries).toEqual(
      Object.entries(LOADER_PRIORITIES).map(([name, priority]) => ({ name, priority, status: 'active' }))
    );
    expect(registry.all('deliverer').map((deliverer) => deliverer.name)).toEqual(['openai', 'claude']);
  });

  it('페이지 문서를 선택해서 텍스트로 렌더링해야 한다', async () => {
    const path = await workspace.file('report.txt', 'one\fTwo\fthree\f');
    setup();

    const attachment = await pipeline.run(`${path}[pages:1,N]`);

    expect(attachment.text).toBe('--- Page 1 ---\none\n\n--- Page 3 ---\nthree');
    expect(attachment.images).toBeNull();
    expect(attachment.diagnostics.filter((entry) => entry.outcome === 'matched')).toEqual([
      { stage: 'load', kind: 'loader', plugin: 'paged-text', outcome: 'matched' },
      { stage: 'render', kind: 'renderer_text', plugin: 'paged-text', outcome: 'matched' },
    ]);
  });

  it('범위를 벗어난 페이지 선택은 아무 페이지도 렌더링하지 않아야 한다', async () => {
    const path = await workspace.file('report.txt', 'alpha\fbeta\fgamma');
    setup();

    const attachment = await pipeline.run(`${path}[pages:9]`);

    expect(attachment.text).toBe('');
    expect(log.warn).toHaveBeenCalledWith(`Page selection '9' matched no pages in ${path}`);
  });

  it('구조화된 데이터를 선택하고 YAML로 출력해야 한다', async () => {
    const path = await workspace.file('data.json', '{"items":[{"name":"a"},{"name":"b"}]}');
    setup();

    const attachment = await pipeline.run(`${path}[select:items.1,format:yaml]`);

    expect(attachment.text).toBe('name: b');
  });

  it('이미지를 data URL로 렌더링하고 openai 형식으로 포장해야 한다', async () => {
    const path = await workspace.file('pic.png', new Uint8Array([1, 2, 3]));
    setup();

    const attachment = await pipeline.run(path);

    expect(attachment.text).toBeNull();
    expect(pipeline.deliver(attachment, 'OpenAI', 'Describe')).toEqual([
      { type: 'input_text', text: 'Describe' },
      { type: 'input_image', image_url: 'data:image/png;base64,AQID' },
    ]);
  });

  it('알 수 없는 확장자는 plain-text로 읽고 토큰을 순서대로 적용해야 한다', async () => {
    const path = await workspace.file('notes.log', 'hello\nworld\nagain');
    setup();

    expect((await pipeline.run(`${path}[lines:2-3,head:1]`)).text).toBe('world');
    expect((await pipeline.run(`${path}[nosuch]`)).text).toBe('hello\nworld\nagain');
  });

  it('PDF는 주입한 extractor로 읽어야 한다', async () => {
    const path = await workspace.file('doc.pdf', 'not really a pdf');
    setup();

    expect((await pipeline.run(`${path}[pages:2]`)).text).toBe('--- Page 2 ---\nsecond');
  });

  it('unpdf가 없으면 PDF loader를 건너뛰고 경고해야 한다', async () => {
    const path = await workspace.file('doc.pdf', 'raw bytes');
    setup({ pdf: { gate: { probe: () => false } } });

    expect(log.warn).toHaveBeenCalledWith('Skipping plugin pdf - missing: unpdf');
    expect(describeRegistry(registry).disabled).toEqual([
      { kind: 'loader', name: 'pdf', priority: 100, missing: ['unpdf'], hints: ['npm install unpdf'] },
    ]);
    expect((await pipeline.run(path)).text).toBe('raw bytes');
  });

  it('설정의 priority가 기본 priority보다 우선해야 한다', async () => {
    const path = await workspace.file('report.txt', 'one\fTwo');
    const api = createPluginApi({
      registry,
      logger: log.logger,
      config: { ...defaultConfig(), priorities: { 'plain-text': 500 } },
    });
    setup(withPdf, api);

    expect((await pipeline.run(path)).text).toBe('one\fTwo');
  });

  it('CSV는 기본으로 요약 표(csv-brief)로 렌더링해야 한다', async () => {
    const path = await workspace.file('scores.csv', 'name,score\na,1\nb,2\n');
    setup();

    const attachment = await pipeline.run(path);

    expect(attachment.text).toBe(
      [
        '### CSV SUMMARY',
        '',
        `${path}: 2 rows × 2 columns`,
        'Columns: name, score',
        '',
        '| name | score |',
        '| --- | --- |',
        '| a | 1 |',
        '| b | 2 |',
      ].join('\n')
    );
    expect(attachment.diagnostics.filter((entry) => entry.outcome === 'matched')).toEqual([
      { stage: 'load', kind: 'loader', plugin: 'csv', outcome: 'matched' },
      { stage: 'render', kind: 'renderer_text', plugin: 'csv-brief', outcome: 'matched' },
    ]);
  });

  it('설정으로 csv-full을 올리면 summary 결과를 전체 표로 렌더링해야 한다', async () => {
    const path = await workspace.file('scores.csv', 'name,score\na,1\nb,2\n');
    const api = createPluginApi({
      registry,
      logger: log.logger,
      config: { ...defaultConfig(), priorities: { 'csv-full': 200 } },
    });
    setup(withPdf, api);

    const attachment = await pipeline.run(`${path}[summary]`);

    expect(attachment.text).toBe(
      [
        '| column | count | unique | top | mean | min | max |',
        '| --- | --- | --- | --- | --- | --- | --- |',
        '| name | 2 | 2 | a |  |  |  |',
        '| score | 2 | 2 | 1 | 1.5 | 1 | 2 |',
      ].join('\n')
    );
  });

  it('여러 첨부를 모아서 claude 형식으로 포장해야 한다', async () => {
    const first = await workspace.file('a.log', 'alpha');
    const second = await workspace.file('b.log', 'beta');
    setup();

    const collection = await pipeline.runMany([first, second]);

    expect(collection.text).toBe('alpha\n\nbeta');
    expect(pipeline.deliver(collection, 'claude', 'Compare')).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Compare\n\nalpha\n\nbeta' }] },
    ]);
  });

  it('loader 오류는 StageError로 감싸야 한다', async () => {
    const path = await workspace.file('broken.json', '{');
    setup();

    const error = await pipeline.run(path).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: 'load', kind: 'loader', plugin: 'structured' });
  });

  it('loader가 하나도 없으면 NoLoaderError를 던져야 한다', async () => {
    await expect(pipeline.run('missing.txt')).rejects.toBeInstanceOf(NoLoaderError);
  });
});
