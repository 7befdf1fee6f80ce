/**
 * attachkit 오류 타입 정의
 *
 * 사용자에게 보이는 오류는 항상 식별자, 단계(stage), 플러그인 kind를 포함한다.
 */

/**
 * 파이프라인 단계 이름
 */
export type StageName = 'split' | 'load' | 'transform' | 'render' | 'deliver';

/**
 * attachkit 오류의 기본 클래스
 */
export class AttachkitError extends Error {
  readonly errorCause?: unknown;
  /** 사용자에게 다음 행동을 안내하는 메시지 */
  readonly suggestion?: string;

  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super(message);
    this.name = 'AttachkitError';
    if (options?.cause) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * locator를 처리할 Loader가 없음
 */
export class NoLoaderError extends AttachkitError {
  readonly locator: string;
  readonly identifier: string;

  constructor(locator: string, identifier: string = locator) {
    super(`No loader registered for '${locator}' (identifier: ${identifier}, stage: load, kind: loader)`, {
      suggestion: 'Register a loader whose match() accepts this locator, or check the file extension.',
    });
    this.name = 'NoLoaderError';
    this.locator = locator;
    this.identifier = identifier;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 요청한 style의 Deliverer가 없음
 */
export class NoDelivererError extends AttachkitError {
  readonly style: string;

  constructor(style: string, available: string[] = []) {
    const known = available.length > 0 ? available.join(', ') : 'none';
    super(`No deliverer named '${style}' (stage: deliver, kind: deliverer). Available: ${known}`, {
      suggestion: 'Pass one of the available styles or register a deliverer with this name.',
    });
    this.name = 'NoDelivererError';
    this.style = style;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 비활성화된 플러그인이 실제로 호출됨
 */
export class MissingCapabilityError extends AttachkitError {
  readonly pluginName: string;
  readonly missing: readonly string[];
  readonly hints: readonly string[];

  constructor(pluginName: string, missing: readonly string[], hints: readonly string[]) {
    const hintText = hints.length > 0 ? ` Try: ${hints.join('; ')}` : '';
    super(
      `Plugin '${pluginName}' is unavailable: missing ${missing.map((name) => `'${name}'`).join(', ')}.${hintText}`,
      { suggestion: hints.join('\n') || undefined }
    );
    this.name = 'MissingCapabilityError';
    this.pluginName = pluginName;
    this.missing = missing;
    this.hints = hints;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 타입 기반 디스패치 실패
 */
export class DispatchError extends AttachkitError {
  readonly role: string;
  readonly offeredType: string;
  readonly availableTypes: readonly string[];

  constructor(role: string, offeredType: string, availableTypes: readonly string[]) {
    const known = availableTypes.length > 0 ? availableTypes.join(', ') : 'none';
    super(`No '${role}' implementation for type ${offeredType}. Implemented for: ${known}`);
    this.name = 'DispatchError';
    this.role = role;
    this.offeredType = offeredType;
    this.availableTypes = availableTypes;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * StageError 옵션
 */
export interface StageErrorOptions {
  identifier: string;
  stage: StageName;
  kind: string;
  plugin: string;
  cause: unknown;
}

/**
 * 단계 실행 중 플러그인이 던진 오류
 */
export class StageError extends AttachkitError {
  readonly identifier: string;
  readonly stage: StageName;
  readonly kind: string;
  readonly plugin: string;

  constructor(options: StageErrorOptions) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(
      `${options.stage} failed for '${options.identifier}' in ${options.kind} '${options.plugin}': ${reason}`,
      { cause: options.cause }
    );
    this.name = 'StageError';
    this.identifier = options.identifier;
    this.stage = options.stage;
    this.kind = options.kind;
    this.plugin = options.plugin;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * strict 모드에서의 명령 블록 문법 오류
 */
export class CommandSyntaxError extends AttachkitError {
  readonly block: string;
  readonly token: string;

  constructor(message: string, block: string, token: string) {
    super(message, { suggestion: 'Use name or name:argument tokens separated by commas.' });
    this.name = 'CommandSyntaxError';
    this.block = block;
    this.token = token;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 설정 파일 오류
 */
export class ConfigError extends AttachkitError {
  readonly source?: string;

  constructor(message: string, options: { cause?: unknown; source?: string; suggestion?: string } = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'ConfigError';
    this.source = options.source;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * AttachkitError 인스턴스인지 확인
 * @param value 확인할 값
 * @returns AttachkitError 여부
 */
export function isAttachkitError(value: unknown): value is AttachkitError {
  return value instanceof AttachkitError;
}
