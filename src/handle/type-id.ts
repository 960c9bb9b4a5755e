/**
 * Runtime identity of a concrete type: its exact constructor.
 */
export type TypeId = abstract new (...args: never[]) => unknown;

/**
 * The value a box holds when its identity is `C`. Primitive payloads are
 * identified by their wrapper constructor but stored unboxed.
 */
export type Concrete<C extends TypeId> = C extends StringConstructor
  ? string
  : C extends NumberConstructor
    ? number
    : C extends BooleanConstructor
      ? boolean
      : InstanceType<C>;

function isTypeId(value: unknown): value is TypeId {
  return typeof value === 'function';
}

/**
 * Identity token for a value. Subclasses yield their own constructor, so a
 * `RangeError` never shares a token with `Error`.
 */
export function typeIdOf(value: unknown): TypeId {
  switch (typeof value) {
    case 'string':
      return String;
    case 'number':
      return Number;
    case 'boolean':
      return Boolean;
    case 'object':
      if (value === null) {
        return Object;
      }
      break;
    default:
      return Object;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  if (typeof prototype === 'object' && prototype !== null && 'constructor' in prototype) {
    const ctor: unknown = prototype.constructor;
    if (isTypeId(ctor)) {
      return ctor;
    }
  }
  return Object;
}

export function typeNameOf(value: unknown): string {
  return typeIdOf(value).name;
}
