import { CONTRACTS } from '../plugin/types.js';
import { Registry } from './registry.js';

export { Registry, DEFAULT_PRIORITY } from './registry.js';
export type { RegistryEntry, DisabledRegistration, RegistryOptions } from './registry.js';

/**
 * 계약 설명을 `abc` kind에 priority 0으로 등록 (introspection 전용)
 */
export function registerContracts(registry: Registry): void {
  for (const contract of CONTRACTS) {
    if (!registry.has('abc', contract)) {
      registry.register('abc', contract, 0);
    }
  }
}

/**
 * 프로세스 기본 레지스트리
 * 편의용 wiring일 뿐, 모든 컴포넌트는 명시적인 Registry를 받을 수 있다.
 */
export const defaultRegistry = new Registry();
registerContracts(defaultRegistry);
