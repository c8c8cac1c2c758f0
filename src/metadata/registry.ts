import { Key, decodeKey } from '../keys/key.js';
import type { EntityDescriptor, MemberDescriptor, MetadataProvider } from './types.js';

const TYPE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.$]{0,254}$/;

/**
 * Validates an EntityDescriptor and returns it typed.
 * Throws if the type name is malformed, member names repeat, there is not exactly
 * one primary key, or there is more than one ancestor pointer.
 */
export function defineEntity(def: EntityDescriptor): EntityDescriptor {
  if (!TYPE_NAME_PATTERN.test(def.type)) {
    throw new Error(`defineEntity: type "${def.type}" is not a valid type name`);
  }
  if (def.kind !== undefined && def.kind.trim() === '') {
    throw new Error(`defineEntity: "${def.type}" has an empty kind`);
  }
  checkMembers(def.type, def.members);

  const keys = def.members.filter((m) => m.isPrimaryKey === true);
  if (keys.length !== 1) {
    throw new Error(`defineEntity: "${def.type}" must declare exactly one primary key (found ${keys.length})`);
  }
  const ancestors = def.members.filter((m) => m.isAncestorPointer === true);
  if (ancestors.length > 1) {
    throw new Error(`defineEntity: "${def.type}" declares ${ancestors.length} ancestor pointers`);
  }
  return def;
}

function checkMembers(owner: string, members: readonly MemberDescriptor[]): void {
  const seen = new Set<string>();
  for (const member of members) {
    if (member.name.trim() === '') {
      throw new Error(`defineEntity: "${owner}" has a member with an empty name`);
    }
    if (seen.has(member.name)) {
      throw new Error(`defineEntity: "${owner}" declares member "${member.name}" twice`);
    }
    seen.add(member.name);
    if (member.declaredType === 'embedded') {
      if (member.embeddedMembers === undefined || member.embeddedMembers.length === 0) {
        throw new Error(`defineEntity: embedded member "${owner}.${member.name}" has no members`);
      }
      checkMembers(`${owner}.${member.name}`, member.embeddedMembers);
    }
    if (member.declaredType === 'relation' && member.relation === undefined) {
      throw new Error(`defineEntity: relation member "${owner}.${member.name}" has no relation descriptor`);
    }
    if (member.declaredType === 'enum' && member.enumType === undefined) {
      throw new Error(`defineEntity: enum member "${owner}.${member.name}" has no enumType`);
    }
  }
}

/**
 * In-memory MetadataProvider over a set of entity descriptors.
 *
 * @example
 * const registry = new MetadataRegistry([
 *   defineEntity({ type: 'Book', members: [{ name: 'id', declaredType: 'key', isPrimaryKey: true }] }),
 * ]);
 */
export class MetadataRegistry implements MetadataProvider {
  private readonly entities = new Map<string, EntityDescriptor>();

  constructor(entities: readonly EntityDescriptor[] = []) {
    for (const entity of entities) this.register(entity);
  }

  register(entity: EntityDescriptor): this {
    const def = defineEntity(entity);
    if (this.entities.has(def.type)) {
      throw new Error(`MetadataRegistry: "${def.type}" is already registered`);
    }
    this.entities.set(def.type, def);
    return this;
  }

  entityFor(type: string): EntityDescriptor | null {
    return this.entities.get(type) ?? null;
  }

  memberFor(type: string, path: readonly string[]): MemberDescriptor | null {
    const entity = this.entityFor(type);
    if (entity === null || path.length === 0) return null;
    let members: readonly MemberDescriptor[] = entity.members;
    let found: MemberDescriptor | null = null;
    for (const segment of path) {
      if (found !== null) {
        if (found.embeddedMembers === undefined) return null;
        members = found.embeddedMembers;
      }
      found = members.find((m) => m.name === segment) ?? null;
      if (found === null) return null;
    }
    return found;
  }

  kindNameFor(type: string): string {
    const entity = this.entityFor(type);
    return entity?.kind ?? type;
  }

  identifierOf(type: string, value: object): Key | null {
    const entity = this.entityFor(type);
    if (entity === null) return null;
    const pk = entity.members.find((m) => m.isPrimaryKey === true);
    if (pk === undefined) return null;
    const raw: unknown = Reflect.get(value, pk.name);
    if (raw instanceof Key) return raw;
    if (typeof raw === 'number') return Key.of(this.kindNameFor(type), raw);
    if (typeof raw === 'string' && raw !== '') {
      if (pk.keyForm === 'name') return Key.of(this.kindNameFor(type), raw);
      return decodeKey(raw);
    }
    return null;
  }
}
