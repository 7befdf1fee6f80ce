/**
 * TypeUniverse
 *
 * 이름 → 타입 디스크립터, 이름 → duck-typing shape(속성 key 목록)을 보관한다.
 * 참여하는 모든 타입이 선언된 뒤 complete()로 닫히며,
 * ref는 디스패치 시점에 이 universe에서 해석된다.
 */

import { checkPrimitive, type TypeSpec } from './types.js';

export interface DeclareOptions {
  /** duck-typing fallback에 사용할 속성 key 목록 */
  shape?: readonly string[];
}

export interface CompletionResult {
  /** 선언되지 않은 ref 이름 */
  unresolved: string[];
}

function hasAttributes(value: unknown, keys: readonly string[]): boolean {
  if (keys.length === 0) {
    return false;
  }
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return keys.every((key) => key in value);
}

export class TypeUniverse {
  private readonly specs = new Map<string, TypeSpec>();
  private readonly shapes = new Map<string, readonly string[]>();
  private completed = false;

  /**
   * 타입 선언 (같은 이름은 덮어씀)
   * complete() 이후에는 선언할 수 없다.
   */
  declare(name: string, spec: TypeSpec, options: DeclareOptions = {}): this {
    if (this.completed) {
      throw new TypeError(`TypeUniverse is complete; cannot declare '${name}'`);
    }
    this.specs.set(name, spec);
    if (options.shape) {
      this.shapes.set(name, [...options.shape]);
    }
    return this;
  }

  /**
   * 선언만 shape으로 하는 타입 (런타임 멤버십 검사 없이 duck-typing만 사용)
   */
  declareShape(name: string, shape: readonly string[]): this {
    if (this.completed) {
      throw new TypeError(`TypeUniverse is complete; cannot declare '${name}'`);
    }
    this.shapes.set(name, [...shape]);
    return this;
  }

  /**
   * universe를 닫고 해석되지 않은 ref 목록을 반환
   */
  complete(): CompletionResult {
    this.completed = true;
    const unresolved = new Set<string>();
    const visit = (spec: TypeSpec): void => {
      if (spec.kind === 'ref' && !this.specs.has(spec.name) && !this.shapes.has(spec.name)) {
        unresolved.add(spec.name);
      } else if (spec.kind === 'union') {
        spec.members.forEach(visit);
      }
    };
    this.specs.forEach(visit);
    return { unresolved: [...unresolved] };
  }

  isComplete(): boolean {
    return this.completed;
  }

  names(): string[] {
    return [...new Set([...this.specs.keys(), ...this.shapes.keys()])];
  }

  resolve(name: string): TypeSpec | undefined {
    return this.specs.get(name);
  }

  shape(name: string): readonly string[] | undefined {
    return this.shapes.get(name);
  }

  /**
   * 런타임 멤버십 검사 (direct, ref, union)
   * 알 수 없는 ref나 순환 ref는 불일치로 처리한다.
   */
  matches(spec: TypeSpec, value: unknown): boolean {
    return this.matchesWith(spec, value, new Set());
  }

  /**
   * duck-typing 검사: 이름 있는 타입의 shape 속성을 모두 가지고 있으면 일치
   */
  matchesShape(spec: TypeSpec, value: unknown): boolean {
    return this.matchesShapeWith(spec, value, new Set());
  }

  private matchesWith(spec: TypeSpec, value: unknown, visiting: Set<string>): boolean {
    switch (spec.kind) {
      case 'any':
        return true;
      case 'instance':
        return value instanceof spec.ctor;
      case 'primitive':
        return checkPrimitive(spec.name, value);
      case 'guard':
        return spec.test(value);
      case 'ref': {
        const target = this.specs.get(spec.name);
        if (!target || visiting.has(spec.name)) {
          return false;
        }
        visiting.add(spec.name);
        try {
          return this.matchesWith(target, value, visiting);
        } finally {
          visiting.delete(spec.name);
        }
      }
      case 'union':
        return spec.members.some((member) => this.matchesWith(member, value, visiting));
    }
  }

  private matchesShapeWith(spec: TypeSpec, value: unknown, visiting: Set<string>): boolean {
    switch (spec.kind) {
      case 'any':
      case 'primitive':
        return false;
      case 'instance':
      case 'guard':
        return hasAttributes(value, this.shapes.get(spec.name) ?? []);
      case 'ref': {
        if (visiting.has(spec.name)) {
          return false;
        }
        const own = this.shapes.get(spec.name);
        if (own) {
          return hasAttributes(value, own);
        }
        const target = this.specs.get(spec.name);
        if (!target) {
          return false;
        }
        visiting.add(spec.name);
        try {
          return this.matchesShapeWith(target, value, visiting);
        } finally {
          visiting.delete(spec.name);
        }
      }
      case 'union':
        return spec.members.some((member) => this.matchesShapeWith(member, value, visiting));
    }
  }
}
