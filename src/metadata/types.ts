import type { Key } from '../keys/key.js';

export type DeclaredType =
  | 'string'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'date'
  | 'char'
  | 'bytes'
  | 'enum'
  | 'key'
  | 'list'
  | 'embedded'
  | 'relation';

/**
 * One-to-one relation between two entity types.
 * - 'parent': the member lives on the child and points at its owning parent,
 *   so the child's key has the parent's key as ancestor.
 * - 'child': the member lives on the parent and points at the owned child.
 */
export interface RelationDescriptor {
  readonly targetType: string;
  readonly side: 'parent' | 'child';
}

export interface MemberDescriptor {
  readonly name: string;
  readonly declaredType: DeclaredType;
  readonly isPrimaryKey?: boolean;
  /** Holds the key of the record's parent (the ancestor constraint). */
  readonly isAncestorPointer?: boolean;
  /** Store property name; the member name when absent. */
  readonly storeName?: string;
  /** For 'enum' members: the enum object (TypeScript enums included). */
  readonly enumType?: Readonly<Record<string, string | number>>;
  /** For 'embedded' members. */
  readonly embeddedMembers?: readonly MemberDescriptor[];
  /** For 'relation' members. */
  readonly relation?: RelationDescriptor;
  /**
   * For primary-key and ancestor members: how the key is exposed on the object.
   * 'key' (a Key instance), 'encoded' (Key.encode()), 'id' (numeric id), 'name' (string name).
   */
  readonly keyForm?: 'key' | 'encoded' | 'id' | 'name';
}

export interface EntityDescriptor {
  /** Type name used by queries (the candidate). */
  readonly type: string;
  /** Store kind; the type name when absent. */
  readonly kind?: string;
  readonly members: readonly MemberDescriptor[];
}

export interface MetadataProvider {
  entityFor(type: string): EntityDescriptor | null;
  /** Resolves a member path, following embedded members. Null when unknown. */
  memberFor(type: string, path: readonly string[]): MemberDescriptor | null;
  kindNameFor(type: string): string;
  /** Extracts the identifier of an object of the given type; null when it has none. */
  identifierOf(type: string, value: object): Key | null;
}

export function storeNameFor(member: MemberDescriptor): string {
  return member.storeName ?? member.name;
}
