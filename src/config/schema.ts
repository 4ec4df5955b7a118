/**
 * Schema Descriptors
 *
 * Explicit, tagged type descriptors for configuration records. A record
 * schema maps field names to descriptors; the validator interprets them
 * by recursive descent and `Infer` maps them to static types.
 */

// ============================================================================
// Descriptor Types
// ============================================================================

/**
 * Primitive kinds a field can be declared as.
 */
export type PrimitiveKind = 'string' | 'integer' | 'float' | 'boolean';

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly type: PrimitiveKind;
}

/**
 * Value of the inner type, or absence (`null` / `undefined`).
 */
export interface OptionalType {
  readonly kind: 'optional';
  readonly inner: TypeDescriptor;
}

export interface ListType {
  readonly kind: 'list';
  readonly item: TypeDescriptor;
}

export interface MapType {
  readonly kind: 'map';
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
}

/**
 * A string restricted to a fixed set of values.
 */
export interface LiteralType {
  readonly kind: 'literal';
  readonly allowed: readonly string[];
}

/**
 * Matches when any member matches.
 */
export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly TypeDescriptor[];
}

export type TypeDescriptor =
  | PrimitiveType
  | OptionalType
  | ListType
  | MapType
  | LiteralType
  | UnionType;

/**
 * Field name to declared type, in declaration order.
 */
export type RecordSchema = Readonly<Record<string, TypeDescriptor>>;

// ============================================================================
// Static Inference
// ============================================================================

interface PrimitiveValues {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
}

/**
 * Static type described by a descriptor.
 */
export type Infer<D> = D extends { kind: 'primitive'; type: infer K extends PrimitiveKind }
  ? PrimitiveValues[K]
  : D extends { kind: 'optional'; inner: infer I }
    ? Infer<I> | null
    : D extends { kind: 'list'; item: infer I }
      ? Infer<I>[]
      : D extends { kind: 'map'; key: infer K; value: infer V }
        ? { [P in Infer<K> & string]?: Infer<V> }
        : D extends { kind: 'literal'; allowed: readonly (infer A)[] }
          ? A
          : D extends { kind: 'union'; members: readonly (infer M)[] }
            ? Infer<M>
            : never;

export type InferRecord<S extends RecordSchema> = { -readonly [K in keyof S]: Infer<S[K]> };

// ============================================================================
// Builders
// ============================================================================

function primitive<K extends PrimitiveKind>(type: K): PrimitiveType & { readonly type: K } {
  return { kind: 'primitive', type };
}

/**
 * Descriptor builders.
 *
 * @example
 * ```typescript
 * const regions = t.optional(t.map(t.literal(['iad', 'sea']), t.integer()));
 * type Regions = Infer<typeof regions>; // { iad?: number; sea?: number } | null
 * ```
 */
export const t = {
  string: () => primitive('string'),
  integer: () => primitive('integer'),
  float: () => primitive('float'),
  boolean: () => primitive('boolean'),

  optional<T extends TypeDescriptor>(inner: T): OptionalType & { readonly inner: T } {
    return { kind: 'optional', inner };
  },

  list<T extends TypeDescriptor>(item: T): ListType & { readonly item: T } {
    return { kind: 'list', item };
  },

  map<K extends TypeDescriptor, V extends TypeDescriptor>(
    key: K,
    value: V
  ): MapType & { readonly key: K; readonly value: V } {
    return { kind: 'map', key, value };
  },

  literal<A extends string>(allowed: readonly A[]): LiteralType & { readonly allowed: readonly A[] } {
    return { kind: 'literal', allowed: [...allowed] };
  },

  union<M extends readonly [TypeDescriptor, TypeDescriptor, ...TypeDescriptor[]]>(
    ...members: M
  ): UnionType & { readonly members: M } {
    return { kind: 'union', members };
  },
};

// ============================================================================
// Description
// ============================================================================

/**
 * Render a descriptor as a compact type expression,
 * e.g. `optional<mapping<"iad" | "sea", integer>>`.
 */
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive':
      return type.type;
    case 'optional':
      return `optional<${describeType(type.inner)}>`;
    case 'list':
      return `list<${describeType(type.item)}>`;
    case 'map':
      return `mapping<${describeType(type.key)}, ${describeType(type.value)}>`;
    case 'literal':
      return type.allowed.map((value) => `"${value}"`).join(' | ');
    case 'union':
      return type.members.map((member) => describeType(member)).join(' | ');
    default: {
      const _exhaustive: never = type;
      return String(_exhaustive);
    }
  }
}
