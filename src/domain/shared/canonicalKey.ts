/**
 * Encodes a value into a string that is equal for structurally equal values
 * and different otherwise.
 *
 * Every value is tagged with its type, so `undefined`, `null`, `NaN`, a Date
 * and its ISO string all encode differently. Object keys, Map entries and Set
 * members are sorted, so insertion order does not matter. A reference back to
 * an object that is still being encoded becomes `^n`, `n` being how many
 * levels up that object sits.
 */
export function canonicalKey(value: unknown): string {
  return encode(value, []);
}

function encode(value: unknown, ancestors: object[]): string {
  if (typeof value !== 'object' || value === null) {
    return encodePrimitive(value);
  }

  const level = ancestors.lastIndexOf(value);
  if (level !== -1) {
    return `^${ancestors.length - level}`;
  }

  ancestors.push(value);
  try {
    return encodeObject(value, ancestors);
  } finally {
    ancestors.pop();
  }
}

function encodePrimitive(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return `n:${Object.is(value, -0) ? '-0' : String(value)}`;
    case 'bigint':
      return `i:${value.toString()}`;
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'symbol':
      return `y:${JSON.stringify(value.description ?? '')}`;
    case 'function':
      return `f:${JSON.stringify(value.name)}`;
    default:
      return 'u';
  }
}

function encodeObject(value: object, ancestors: object[]): string {
  if (value instanceof Date) {
    return `D:${value.getTime()}`;
  }
  if (value instanceof RegExp) {
    return `R:${JSON.stringify(value.toString())}`;
  }
  if (Array.isArray(value)) {
    return `[${Array.from(value, item => encode(item, ancestors)).join(',')}]`;
  }
  if (value instanceof Map) {
    const entries = Array.from(
      value,
      ([key, item]) => `${encode(key, ancestors)}=>${encode(item, ancestors)}`
    );
    return `M{${entries.sort().join(',')}}`;
  }
  if (value instanceof Set) {
    const members = Array.from(value, item => encode(item, ancestors));
    return `S{${members.sort().join(',')}}`;
  }
  if (ArrayBuffer.isView(value)) {
    const bytes = Buffer.from(value.buffer, value.byteOffset, value.byteLength);
    return `B:${value.constructor.name}:${bytes.toString('hex')}`;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  const kind =
    prototype === null || prototype === Object.prototype ? '' : value.constructor.name;
  const fields = Object.keys(value)
    .sort()
    .map(key => `${JSON.stringify(key)}:${encode(Reflect.get(value, key), ancestors)}`);
  return `${kind}{${fields.join(',')}}`;
}
