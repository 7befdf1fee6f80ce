/**
 * Type-Directed Dispatch
 *
 * 하나의 role(예: present, describe)에 대해 타입별 구현을 모아
 * 데이터의 런타임 타입으로 구현을 선택하는 callable을 만든다.
 *
 * 선택 순서:
 * 1. 타입이 지정된 구현 (direct, ref, union)을 등록 순서대로 검사
 * 2. 1에서 일치가 없으면 duck-typing shape으로 다시 검사
 * 3. 그래도 없으면 wildcard 구현
 */

import { DispatchError } from '../errors.js';
import { describeValueType, isSameType, typeName, type TypeSpec } from './types.js';
import { TypeUniverse } from './universe.js';

export type DispatchFunction<A extends unknown[], R> = (datum: unknown, ...args: A) => R;

export interface DispatchImplementation<A extends unknown[], R> {
  readonly type: TypeSpec;
  readonly name: string;
  readonly fn: DispatchFunction<A, R>;
}

export type MatchReason = 'exact' | 'shape' | 'wildcard';

export interface DispatchSelection<A extends unknown[], R> {
  implementation: DispatchImplementation<A, R>;
  reason: MatchReason;
}

export interface Dispatcher<A extends unknown[] = [], R = unknown> {
  readonly role: string;
  readonly universe: TypeUniverse;
  /**
   * 구현 등록 (같은 타입은 마지막 등록이 우선)
   * 타입 비교는 isSameType 기준이며 표시 이름만 같은 타입은 덮어쓰지 않는다.
   */
  register(type: TypeSpec, fn: DispatchFunction<A, R>): Dispatcher<A, R>;
  has(type: TypeSpec): boolean;
  /** 구현이 있는 타입 이름 목록 */
  types(): string[];
  /** 일치하는 구현 선택 (없으면 undefined) */
  select(datum: unknown): DispatchSelection<A, R> | undefined;
  dispatch(datum: unknown, ...args: A): R;
}

export interface CreateDispatcherOptions {
  logger?: Console;
}

export function createDispatcher<A extends unknown[] = [], R = unknown>(
  role: string,
  universe: TypeUniverse = new TypeUniverse(),
  options: CreateDispatcherOptions = {}
): Dispatcher<A, R> {
  const table: Array<DispatchImplementation<A, R>> = [];
  const indexOf = (type: TypeSpec): number => table.findIndex((entry) => isSameType(entry.type, type));
  const logger = options.logger;

  const select = (datum: unknown): DispatchSelection<A, R> | undefined => {
    if (!universe.isComplete()) {
      const { unresolved } = universe.complete();
      if (unresolved.length > 0) {
        logger?.debug?.(`Unresolved type references in '${role}': ${unresolved.join(', ')}`);
      }
    }

    const typed = table.filter((entry) => entry.type.kind !== 'any');

    for (const entry of typed) {
      if (universe.matches(entry.type, datum)) {
        return { implementation: entry, reason: 'exact' };
      }
    }

    for (const entry of typed) {
      if (universe.matchesShape(entry.type, datum)) {
        return { implementation: entry, reason: 'shape' };
      }
    }

    const wildcard = table.find((entry) => entry.type.kind === 'any');
    return wildcard ? { implementation: wildcard, reason: 'wildcard' } : undefined;
  };

  const dispatcher: Dispatcher<A, R> = {
    role,
    universe,
    register(type, fn) {
      const existing = indexOf(type);
      if (existing >= 0) {
        table.splice(existing, 1);
      }
      table.push({ type, name: typeName(type), fn });
      return dispatcher;
    },
    has(type) {
      return indexOf(type) >= 0;
    },
    types() {
      return table.map((entry) => entry.name);
    },
    select,
    dispatch(datum, ...args) {
      const selection = select(datum);
      if (!selection) {
        throw new DispatchError(role, describeValueType(datum), dispatcher.types());
      }
      logger?.debug?.(
        `Dispatch '${role}' → ${selection.implementation.name} (${selection.reason})`
      );
      return selection.implementation.fn(datum, ...args);
    },
  };

  return dispatcher;
}
