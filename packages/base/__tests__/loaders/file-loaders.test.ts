/**
 * 파일 기반 Loader 테스트
 */
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MissingCapabilityError, isDisabledPlugin } from '@attachkit/core';
import { csvLoader, parseCsv } from '../../src/loaders/csv.js';
import { audioLoader, imageLoader } from '../../src/loaders/media.js';
import { createPdfLoader } from '../../src/loaders/pdf.js';
import { structuredLoader } from '../../src/loaders/structured.js';
import { pagedTextLoader, plainTextLoader } from '../../src/loaders/text.js';
import { createContext, createTempWorkspace, type TempWorkspace } from '../helpers.js';

describe('파일 Loader', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('paged-text', () => {
    it('.txt와 .md만 일치해야 한다', () => {
      expect(pagedTextLoader.match('notes.txt')).toBe(true);
      expect(pagedTextLoader.match('README.MD')).toBe(true);
      expect(pagedTextLoader.match('data.json')).toBe(false);
      expect(pagedTextLoader.match('https://example.test/notes.txt')).toBe(false);
    });

    it('form feed로 페이지를 나누고 마지막 빈 페이지는 버려야 한다', async () => {
      const path = await workspace.file('report.txt', 'one\fTwo\fthree\f');

      const doc = await pagedTextLoader.load(path, createContext(path));

      expect(doc).toEqual({ kind: 'paged', source: path, pages: ['one', 'Two', 'three'], pageNumbers: [1, 2, 3] });
    });

    it('중간의 빈 페이지는 번호를 유지하기 위해 남겨야 한다', async () => {
      const path = await workspace.file('gaps.txt', 'a\f\fc');

      const doc = await pagedTextLoader.load(path, createContext(path));

      expect(doc.pages).toEqual(['a', '', 'c']);
      expect(doc.pageNumbers).toEqual([1, 2, 3]);
    });
  });

  describe('plain-text', () => {
    it('모든 locator와 일치하고 UTF-8로 읽어야 한다', async () => {
      const path = await workspace.file('notes.log', '안녕\nworld');

      expect(plainTextLoader.match('anything')).toBe(true);
      expect(await plainTextLoader.load(path, createContext(path))).toBe('안녕\nworld');
    });
  });

  describe('structured', () => {
    it('JSON과 YAML을 읽어야 한다', async () => {
      const json = await workspace.file('data.json', '{"items":[1,2]}');
      const yaml = await workspace.file('data.yml', 'name: demo\ntags:\n  - a\n');

      expect(await structuredLoader.load(json, createContext(json))).toEqual({
        kind: 'data',
        source: json,
        format: 'json',
        value: { items: [1, 2] },
      });
      expect(await structuredLoader.load(yaml, createContext(yaml))).toEqual({
        kind: 'data',
        source: yaml,
        format: 'yaml',
        value: { name: 'demo', tags: ['a'] },
      });
    });

    it('잘못된 JSON은 예외를 던져야 한다', async () => {
      const path = await workspace.file('broken.json', '{');

      await expect(structuredLoader.load(path, createContext(path))).rejects.toThrow(SyntaxError);
    });
  });

  describe('csv', () => {
    it('.csv와 .tsv만 일치해야 한다', () => {
      expect(csvLoader.match('scores.csv')).toBe(true);
      expect(csvLoader.match('SCORES.TSV')).toBe(true);
      expect(csvLoader.match('data.json')).toBe(false);
      expect(csvLoader.match('https://example.test/scores.csv')).toBe(false);
    });

    it('첫 행을 열 이름으로 읽고 따옴표와 짧은 행을 처리해야 한다', async () => {
      const path = await workspace.file('scores.csv', '\uFEFFname,score\n"Kim, A",90\nLee,85\n\nPark\n');

      const table = await csvLoader.load(path, createContext(path));

      expect(table).toEqual({
        kind: 'table',
        source: path,
        columns: ['name', 'score'],
        rows: [
          ['Kim, A', '90'],
          ['Lee', '85'],
          ['Park', ''],
        ],
      });
    });

    it('.tsv는 탭으로 구분해야 한다', async () => {
      const path = await workspace.file('scores.tsv', 'a\tb\n1\t2\n');

      expect(await csvLoader.load(path, createContext(path))).toEqual({
        kind: 'table',
        source: path,
        columns: ['a', 'b'],
        rows: [['1', '2']],
      });
    });

    it('빈 열 이름은 위치로 채워야 한다', () => {
      expect(parseCsv(',x\n1,2,3\n', 'inline').columns).toEqual(['column_1', 'x']);
      expect(parseCsv(',x\n1,2,3\n', 'inline').rows).toEqual([['1', '2']]);
      expect(parseCsv('', 'empty')).toEqual({ kind: 'table', source: 'empty', columns: [], rows: [] });
    });
  });

  describe('image / audio', () => {
    it('확장자로 MIME 타입을 정해야 한다', async () => {
      const image = await workspace.file('pic.JPG', new Uint8Array([1, 2, 3]));
      const audio = await workspace.file('clip.mp3', new Uint8Array([4]));

      expect(imageLoader.match(image)).toBe(true);
      expect(audioLoader.match(image)).toBe(false);
      expect(await imageLoader.load(image, createContext(image))).toEqual({
        kind: 'binary',
        source: image,
        mimeType: 'image/jpeg',
        data: new Uint8Array([1, 2, 3]),
      });
      expect(await audioLoader.load(audio, createContext(audio))).toEqual({
        kind: 'binary',
        source: audio,
        mimeType: 'audio/mpeg',
        data: new Uint8Array([4]),
      });
    });
  });

  describe('pdf', () => {
    it('주입한 extractor로 페이지를 만들어야 한다', async () => {
      const path = await workspace.file('doc.pdf', new Uint8Array([37, 80, 68, 70]));
      const loader = createPdfLoader({
        extract: async (data) => [`bytes:${data.byteLength}`, 'second'],
        gate: { probe: () => true },
      });

      if (isDisabledPlugin(loader)) {
        throw new Error('pdf loader should be active');
      }
      expect(loader.match(path)).toBe(true);
      expect(await loader.load(path, createContext(path))).toEqual({
        kind: 'paged',
        source: path,
        pages: ['bytes:4', 'second'],
        pageNumbers: [1, 2],
      });
    });

    it('unpdf가 없으면 비활성 stand-in이어야 한다', () => {
      const loader = createPdfLoader({ gate: { probe: () => false } });

      if (!isDisabledPlugin(loader)) {
        throw new Error('pdf loader should be disabled');
      }
      expect(loader.disabled.missing).toEqual(['unpdf']);
      expect(loader.match('doc.pdf')).toBe(false);
      expect(() => loader.load()).toThrow(MissingCapabilityError);
    });
  });
});
