/**
 * attachkit render
 *
 * 식별자를 파이프라인에 통과시키고 텍스트, 출력 묶음(JSON), 또는 Deliverer 형식으로 출력한다.
 */

import type { Attachment } from '@attachkit/core';
import { createDescribeRole, createPresentRole } from '@attachkit/base';
import type { RenderArgs } from '../parser.js';
import type { CliDependencies, ExitCode } from '../types.js';
import { createCommandContext } from './context.js';

export interface RenderCommandInput {
  cmd: RenderArgs;
  deps: CliDependencies;
}

function hasMedia(attachment: Attachment): boolean {
  return (attachment.images?.length ?? 0) > 0 || (attachment.audio?.length ?? 0) > 0;
}

export async function handleRender({ cmd, deps }: RenderCommandInput): Promise<ExitCode> {
  const context = await createCommandContext(deps, { configPath: cmd.config, strict: cmd.strict });
  const collection = await context.pipeline.runMany(cmd.identifiers, { raw: cmd.raw ?? false });

  if (cmd.debug) {
    for (const attachment of collection) {
      deps.io.err(attachment.debug());
    }
  }

  if (cmd.describe) {
    const describe = createDescribeRole({ logger: deps.logger });
    for (const attachment of collection) {
      deps.io.out(`${attachment.original}: ${describe.dispatch(attachment.content)}`);
    }
    return 0;
  }

  const prompt = cmd.prompt ?? null;
  const style = cmd.format ?? (prompt !== null ? context.config.defaultDeliverer : undefined);
  if (style !== undefined) {
    deps.io.out(JSON.stringify(context.pipeline.deliver(collection, style, prompt), null, 2));
    return 0;
  }

  if (cmd.json) {
    deps.io.out(JSON.stringify(collection.outputs(), null, 2));
    return 0;
  }

  // 렌더링 결과가 전혀 없는 첨부는 present role로 content를 직접 출력
  const present = createPresentRole({ logger: deps.logger });
  const parts: string[] = [];
  for (const attachment of collection) {
    if (attachment.text !== null) {
      parts.push(attachment.text);
    } else if (!hasMedia(attachment)) {
      parts.push(present.dispatch(attachment.content));
    }
  }
  deps.io.out(parts.join('\n\n'));

  const images = collection.images?.length ?? 0;
  const audio = collection.audio?.length ?? 0;
  if (images > 0 || audio > 0) {
    deps.io.err(`Rendered ${images} image(s) and ${audio} audio clip(s); use --json or --format to include them.`);
  }
  return 0;
}
