/**
 * Identifier of a stored record: a kind plus either a numeric id or a string name,
 * optionally nested under a parent key. The chain of parents is the record's
 * ancestor path; the root of that chain identifies its entity group.
 */
export class Key {
  private constructor(
    readonly kind: string,
    readonly id: number | null,
    readonly name: string | null,
    readonly parent: Key | null,
  ) {}

  static of(kind: string, idOrName: number | string, parent: Key | null = null): Key {
    if (kind === '') {
      throw new Error('Key: kind must be a non-empty string');
    }
    if (typeof idOrName === 'number') {
      if (!Number.isSafeInteger(idOrName) || idOrName <= 0) {
        throw new Error(`Key: id must be a positive integer (received ${idOrName})`);
      }
      return new Key(kind, idOrName, null, parent);
    }
    if (idOrName === '') {
      throw new Error('Key: name must be a non-empty string');
    }
    return new Key(kind, null, idOrName, parent);
  }

  /** The root of the ancestor chain; the key itself when it has no parent. */
  root(): Key {
    let current: Key = this;
    while (current.parent !== null) current = current.parent;
    return current;
  }

  /** Keys from the root down to and including this one. */
  chain(): Key[] {
    const keys: Key[] = [];
    for (let k: Key | null = this; k !== null; k = k.parent) keys.unshift(k);
    return keys;
  }

  /**
   * Sortable text form. Ids sort before names, ids numerically, and children
   * directly after their parent.
   */
  path(): string {
    return this.chain()
      .map((k) => (k.id !== null ? `${k.kind}:0${String(k.id).padStart(16, '0')}` : `${k.kind}:1${k.name ?? ''}`))
      .join('/');
  }

  equals(other: Key | null): boolean {
    return other !== null && this.path() === other.path();
  }

  /** Opaque, URL-safe string form. Round-trips through decodeKey(). */
  encode(): string {
    const segments = this.chain().map((k) => [k.kind, k.id ?? k.name]);
    return Buffer.from(JSON.stringify(segments), 'utf8').toString('base64url');
  }

  toString(): string {
    return this.chain()
      .map((k) => (k.id !== null ? `${k.kind}(${k.id})` : `${k.kind}("${k.name ?? ''}")`))
      .join('/');
  }
}

export function createKey(kind: string, idOrName: number | string, parent: Key | null = null): Key {
  return Key.of(kind, idOrName, parent);
}

/**
 * Decodes a string produced by Key.encode().
 * Throws if the string is not an encoded key.
 */
export function decodeKey(encoded: string): Key {
  let segments: unknown;
  try {
    segments = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch (err) {
    throw new Error(`decodeKey: "${encoded}" is not an encoded key`, { cause: err });
  }
  if (!Array.isArray(segments) || segments.length === 0) {
    throw new Error(`decodeKey: "${encoded}" is not an encoded key`);
  }
  let key: Key | null = null;
  for (const segment of segments) {
    if (!Array.isArray(segment) || segment.length !== 2) {
      throw new Error(`decodeKey: "${encoded}" is not an encoded key`);
    }
    const kind: unknown = segment[0];
    const idOrName: unknown = segment[1];
    if (typeof kind !== 'string' || (typeof idOrName !== 'number' && typeof idOrName !== 'string')) {
      throw new Error(`decodeKey: "${encoded}" is not an encoded key`);
    }
    key = Key.of(kind, idOrName, key);
  }
  if (key === null) {
    throw new Error(`decodeKey: "${encoded}" is not an encoded key`);
  }
  return key;
}

/** Byte string stored as a short, indexable blob property. */
export class ShortBlob {
  constructor(readonly bytes: Uint8Array) {}

  equals(other: ShortBlob): boolean {
    return Buffer.from(this.bytes).equals(Buffer.from(other.bytes));
  }
}
