/**
 * Capability probe
 *
 * 플러그인이 요구하는 외부 capability(주로 npm 모듈)의 존재 여부를 확인한다.
 * 결과는 예외가 아니라 구조화된 값으로 반환된다.
 */

import { createRequire } from 'node:module';

/**
 * capability 이름을 받아 사용 가능 여부를 반환
 */
export type CapabilityProbe = (capability: string) => boolean;

/**
 * 비활성화된 플러그인의 사유
 */
export interface DisabledPluginMarker {
  readonly pluginName: string;
  readonly missing: readonly string[];
  readonly hints: readonly string[];
}

export type CapabilityStatus =
  | { available: true }
  | { available: false; missing: string[]; hints: string[] };

export interface ProbeOptions {
  /** capability → 설치할 npm 패키지 이름 */
  installNames?: Readonly<Record<string, string>>;
  /** capability → 해결 방법 안내 (installNames보다 우선) */
  hints?: Readonly<Record<string, string>>;
  probe?: CapabilityProbe;
  /** 모듈 해석 기준 경로 (기본: 이 파일) */
  resolveFrom?: string | URL;
}

/**
 * Node 모듈 해석 기반 probe 생성
 * 해석 실패는 false로 변환되며 예외를 밖으로 던지지 않는다.
 */
export function createModuleProbe(resolveFrom: string | URL = import.meta.url): CapabilityProbe {
  const localRequire = createRequire(resolveFrom);
  const cache = new Map<string, boolean>();

  return (capability: string): boolean => {
    const cached = cache.get(capability);
    if (cached !== undefined) {
      return cached;
    }

    let found: boolean;
    try {
      localRequire.resolve(capability);
      found = true;
    } catch {
      found = false;
    }
    cache.set(capability, found);
    return found;
  };
}

/**
 * 해결 방법 안내 문구
 */
export function remediationHint(capability: string, options: ProbeOptions = {}): string {
  const explicit = options.hints?.[capability];
  if (explicit) {
    return explicit;
  }
  const packageName = options.installNames?.[capability] ?? capability;
  return `npm install ${packageName}`;
}

/**
 * capability 목록 확인
 *
 * @param capabilities - 필요한 capability 이름 목록
 * @param options - probe / 안내 문구 옵션
 * @returns 모두 사용 가능하면 `{ available: true }`, 아니면 누락 목록과 안내
 */
export function probeCapabilities(
  capabilities: readonly string[],
  options: ProbeOptions = {}
): CapabilityStatus {
  const probe = options.probe ?? createModuleProbe(options.resolveFrom);
  const missing = capabilities.filter((capability) => !probe(capability));

  if (missing.length === 0) {
    return { available: true };
  }

  return {
    available: false,
    missing,
    hints: missing.map((capability) => remediationHint(capability, options)),
  };
}
