import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { executeCli } from '../src/router.js';
import { createMockDeps, createTempWorkspace, type TempWorkspace } from './helpers.js';

describe('executeCli router', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('unknown 명령은 파싱 오류를 반환한다', async () => {
    const { deps, state } = createMockDeps({ cwd: workspace.path });

    const code = await executeCli(['unknown'], deps);

    expect(code).toBe(2);
    expect(state.errs).toHaveLength(1);
    expect(state.errs[0]?.startsWith('Error: ')).toBe(true);
    expect(state.outs).toEqual([]);
  });

  it('render는 식별자가 하나 이상 필요하다', async () => {
    const { deps } = createMockDeps({ cwd: workspace.path });

    expect(await executeCli(['render'], deps)).toBe(2);
  });

  it('명시한 설정 파일이 없으면 CONFIG_ERROR로 종료한다', async () => {
    const { deps, state } = createMockDeps({ cwd: workspace.path });
    const path = `${workspace.path}/missing.yaml`;

    const code = await executeCli(['doctor', '--config', path], deps);

    expect(code).toBe(3);
    expect(state.errs).toEqual([
      `[CONFIG_ERROR] Configuration file not found: ${path}\nsuggestion: Create attachkit.yaml or pass an existing file.`,
    ]);
  });

  it('--json이면 오류도 JSON으로 출력한다', async () => {
    const { deps, state } = createMockDeps({ cwd: workspace.path });

    const code = await executeCli(['doctor', '--json', '-c', `${workspace.path}/missing.yaml`], deps);

    expect(code).toBe(3);
    expect(JSON.parse(state.errs[0] ?? '')).toMatchObject({ code: 'CONFIG_ERROR', exitCode: 3 });
  });
});
