/**
 * 타입 디스크립터
 *
 * 디스패치 테이블의 key가 되는 런타임 타입 표현.
 * ref는 TypeUniverse에서 이름으로 지연 해석된다.
 */

export type PrimitiveName =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'symbol'
  | 'function'
  | 'undefined'
  | 'null'
  | 'array';

export type Constructor = abstract new (...args: never[]) => unknown;

export interface AnySpec {
  readonly kind: 'any';
}

export interface InstanceSpec {
  readonly kind: 'instance';
  readonly name: string;
  readonly ctor: Constructor;
}

export interface PrimitiveSpec {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

export interface GuardSpec {
  readonly kind: 'guard';
  readonly name: string;
  readonly test: (value: unknown) => boolean;
}

export interface RefSpec {
  readonly kind: 'ref';
  readonly name: string;
}

export interface UnionSpec {
  readonly kind: 'union';
  readonly members: readonly TypeSpec[];
}

export type TypeSpec = AnySpec | InstanceSpec | PrimitiveSpec | GuardSpec | RefSpec | UnionSpec;

const ANY: AnySpec = { kind: 'any' };

export function any(): AnySpec {
  return ANY;
}

export function instance(ctor: Constructor, name: string = ctor.name): InstanceSpec {
  return { kind: 'instance', name, ctor };
}

export function primitive(name: PrimitiveName): PrimitiveSpec {
  return { kind: 'primitive', name };
}

export function guard(name: string, test: (value: unknown) => boolean): GuardSpec {
  return { kind: 'guard', name, test };
}

/**
 * 아직 선언되지 않았을 수 있는 타입을 이름으로 참조
 */
export function ref(name: string): RefSpec {
  return { kind: 'ref', name };
}

export function union(...members: TypeSpec[]): UnionSpec {
  if (members.length === 0) {
    throw new TypeError('union() requires at least one member type');
  }
  return { kind: 'union', members };
}

/**
 * 디스크립터의 표시 이름 (디스패치 테이블 key로도 사용)
 */
export function typeName(spec: TypeSpec): string {
  switch (spec.kind) {
    case 'any':
      return '*';
    case 'instance':
    case 'primitive':
    case 'guard':
    case 'ref':
      return spec.name;
    case 'union':
      return spec.members.map(typeName).join(' | ');
  }
}

/**
 * 같은 디스패치 항목을 가리키는 디스크립터인지 비교
 *
 * instance는 생성자, guard는 predicate의 동일성으로 구분하므로
 * 표시 이름이 같아도 서로 다른 타입이면 별개 항목이다.
 */
export function isSameType(a: TypeSpec, b: TypeSpec): boolean {
  switch (a.kind) {
    case 'any':
      return b.kind === 'any';
    case 'instance':
      return b.kind === 'instance' && a.ctor === b.ctor;
    case 'guard':
      return b.kind === 'guard' && a.test === b.test;
    case 'primitive':
    case 'ref':
      return b.kind === a.kind && b.name === a.name;
    case 'union': {
      if (b.kind !== 'union' || a.members.length !== b.members.length) {
        return false;
      }
      const others = b.members;
      return a.members.every((member, index) => {
        const other = others[index];
        return other !== undefined && isSameType(member, other);
      });
    }
  }
}

export function checkPrimitive(name: PrimitiveName, value: unknown): boolean {
  switch (name) {
    case 'null':
      return value === null;
    case 'array':
      return Array.isArray(value);
    default:
      return typeof value === name;
  }
}

/**
 * 오류 메시지용 런타임 타입 이름
 */
export function describeValueType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) {
      return 'object';
    }
    const ctorName = value.constructor.name;
    return ctorName || 'object';
  }
  return typeof value;
}
