/**
 * Plugin Registry - kind별 우선순위 저장소
 *
 * 각 kind의 엔트리는 priority 내림차순(높을수록 먼저)으로 유지되고,
 * 동일 priority는 등록 순서를 따른다 (안정 정렬).
 * 조회 실패는 예외가 아니라 undefined로 표현된다.
 */

import type { DisabledPluginMarker } from '../gate/probe.js';
import type { PluginKindMap } from '../plugin/types.js';

export const DEFAULT_PRIORITY = 100;

/**
 * 레지스트리 엔트리 (priority 변경 시 교체되며 변경되지 않음)
 */
export interface RegistryEntry<T> {
  readonly implementation: T;
  readonly priority: number;
  /** 등록 순서 (안정 정렬용) */
  readonly registrationOrder: number;
}

/**
 * 등록이 건너뛰어진 비활성 플러그인
 */
export interface DisabledRegistration {
  readonly kind: string;
  readonly name: string;
  readonly priority: number;
  readonly marker: DisabledPluginMarker;
}

export interface RegistryOptions {
  logger?: Console;
}

type EntryStore<M> = { [K in keyof M]?: Array<RegistryEntry<M[K]>> };

function compareEntries<T>(a: RegistryEntry<T>, b: RegistryEntry<T>): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.registrationOrder - b.registrationOrder;
}

function describe(implementation: unknown): string {
  if (typeof implementation === 'object' && implementation !== null && 'name' in implementation) {
    const name = implementation.name;
    if (typeof name === 'string' && name) {
      return name;
    }
  }
  if (typeof implementation === 'function' && implementation.name) {
    return implementation.name;
  }
  return String(implementation);
}

/**
 * 우선순위 기반 플러그인 레지스트리
 *
 * @example
 * ```typescript
 * const registry = new Registry();
 * registry.register('loader', textLoader, 10);
 * const loader = registry.first('loader', (l) => l.match('notes.txt'));
 * ```
 */
export class Registry<M extends object = PluginKindMap> {
  private readonly store: EntryStore<M> = {};
  private readonly kindOrder: Array<keyof M & string> = [];
  private readonly disabledEntries: DisabledRegistration[] = [];
  private sequence = 0;
  private readonly logger: Console;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? console;
  }

  /**
   * 플러그인 등록
   * 같은 kind에 동일한 구현이 이미 있으면 경고 후 무시한다.
   *
   * @returns 새로 등록되었으면 true
   */
  register<K extends keyof M & string>(kind: K, implementation: M[K], priority: number = DEFAULT_PRIORITY): boolean {
    if (!Number.isInteger(priority)) {
      throw new TypeError(`priority must be an integer, got ${String(priority)}`);
    }

    const entries = this.store[kind] ?? [];
    if (entries.some((entry) => entry.implementation === implementation)) {
      this.logger.warn(`Plugin ${describe(implementation)} already registered for kind '${kind}'. Skipping.`);
      return false;
    }

    if (!this.kindOrder.includes(kind)) {
      this.kindOrder.push(kind);
    }

    const next = [
      ...entries,
      { implementation, priority, registrationOrder: this.sequence++ },
    ].sort(compareEntries);
    this.store[kind] = next;
    return true;
  }

  /**
   * 비활성 플러그인 기록 (진단용)
   * 같은 kind/이름은 한 번만 기록하며, 처음 기록될 때만 true를 반환한다.
   */
  recordDisabled(kind: string, marker: DisabledPluginMarker, priority: number = DEFAULT_PRIORITY): boolean {
    const exists = this.disabledEntries.some(
      (entry) => entry.kind === kind && entry.name === marker.pluginName
    );
    if (exists) {
      return false;
    }
    this.disabledEntries.push({ kind, name: marker.pluginName, priority, marker });
    return true;
  }

  /**
   * 구현의 priority를 delta만큼 조정 (모든 kind에 적용)
   * 엔트리는 새 객체로 교체된다.
   */
  bumpPriority(implementation: M[keyof M], delta: number): void {
    if (!Number.isInteger(delta)) {
      throw new TypeError(`delta must be an integer, got ${String(delta)}`);
    }

    for (const kind of this.kindOrder) {
      this.bumpIn(kind, implementation, delta);
    }
  }

  private bumpIn<K extends keyof M & string>(kind: K, implementation: unknown, delta: number): void {
    const entries = this.store[kind];
    if (!entries || !entries.some((entry) => entry.implementation === implementation)) {
      return;
    }
    this.store[kind] = entries
      .map((entry) =>
        entry.implementation === implementation
          ? { ...entry, priority: entry.priority + delta }
          : entry
      )
      .sort(compareEntries);
  }

  /**
   * 조건을 만족하는 첫 번째 플러그인 반환 (priority 내림차순)
   * predicate가 예외를 던지면 해당 엔트리는 불일치로 취급한다.
   */
  first<K extends keyof M & string>(kind: K, predicate: (implementation: M[K]) => boolean): M[K] | undefined {
    for (const entry of this.store[kind] ?? []) {
      let matched = false;
      try {
        matched = predicate(entry.implementation);
      } catch (error) {
        this.logger.debug?.(
          `Predicate failed for ${describe(entry.implementation)} (kind: ${kind}): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      if (matched) {
        return entry.implementation;
      }
    }
    return undefined;
  }

  /**
   * kind의 모든 플러그인 (priority 내림차순)
   */
  all<K extends keyof M & string>(kind: K): Array<M[K]> {
    return (this.store[kind] ?? []).map((entry) => entry.implementation);
  }

  /**
   * kind의 모든 엔트리 (priority 포함, 복사본)
   */
  entries<K extends keyof M & string>(kind: K): Array<RegistryEntry<M[K]>> {
    return [...(this.store[kind] ?? [])];
  }

  has<K extends keyof M & string>(kind: K, implementation: M[K]): boolean {
    return (this.store[kind] ?? []).some((entry) => entry.implementation === implementation);
  }

  /**
   * 한 번이라도 등록된 적 있는 kind 목록
   */
  kinds(): Array<keyof M & string> {
    return this.kindOrder.filter((kind) => (this.store[kind]?.length ?? 0) > 0);
  }

  disabled(): readonly DisabledRegistration[] {
    return [...this.disabledEntries];
  }

  /**
   * 플러그인 제거 (없으면 아무 일도 하지 않음)
   */
  unregister<K extends keyof M & string>(kind: K, implementation: M[K]): void {
    const entries = this.store[kind];
    if (!entries) {
      return;
    }
    this.store[kind] = entries.filter((entry) => entry.implementation !== implementation);
  }

  /**
   * 모든 등록 제거 (테스트 격리용)
   */
  clear(): void {
    for (const kind of this.kindOrder) {
      delete this.store[kind];
    }
    this.kindOrder.length = 0;
    this.disabledEntries.length = 0;
  }

  /**
   * fn 실행 동안만 플러그인을 등록
   * 정상 반환/예외 모든 경로에서 등록을 되돌린다.
   * 이미 등록되어 있던 구현은 그대로 남겨둔다.
   */
  withTemporaryRegistration<K extends keyof M & string, R>(
    kind: K,
    implementation: M[K],
    priority: number,
    fn: () => R
  ): R {
    const added = this.register(kind, implementation, priority);
    try {
      return fn();
    } finally {
      if (added) {
        this.unregister(kind, implementation);
      }
    }
  }

  /**
   * 비동기 버전: 반환된 Promise가 끝날 때 등록을 되돌린다.
   */
  async withTemporaryRegistrationAsync<K extends keyof M & string, R>(
    kind: K,
    implementation: M[K],
    priority: number,
    fn: () => Promise<R>
  ): Promise<R> {
    const added = this.register(kind, implementation, priority);
    try {
      return await fn();
    } finally {
      if (added) {
        this.unregister(kind, implementation);
      }
    }
  }
}
