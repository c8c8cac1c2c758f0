import type { Key } from '../keys/key.js';
import { ShortBlob } from '../keys/key.js';
import type { EntityDescriptor, MemberDescriptor, MetadataProvider } from '../metadata/types.js';
import { storeNameFor } from '../metadata/types.js';
import type { ResolvedField } from '../query/context.js';
import type { NativeRecord, NativeValue } from '../query/types.js';
import type { RecordMaterializer } from '../types.js';

/** Objects already materialized, by type and key path. A Map satisfies it. */
export interface IdentityCache {
  get(key: string): object | undefined;
  set(key: string, value: object): unknown;
}

export interface PlainObjectMaterializerOptions {
  identityCache?: IdentityCache;
}

/**
 * Builds plain objects from native records using entity metadata. The primary
 * key comes from the record key, the ancestor pointer from its parent, and
 * every other member from the record's properties.
 */
export class PlainObjectMaterializer implements RecordMaterializer {
  private readonly cache: IdentityCache | null;

  constructor(
    private readonly metadata: MetadataProvider,
    options: PlainObjectMaterializerOptions = {},
  ) {
    this.cache = options.identityCache ?? null;
  }

  buildWhole(record: NativeRecord, type: string, ignoreCache: boolean): object {
    const entity = this.entity(type);
    const cacheKey = `${entity.type}|${record.key.path()}`;
    if (this.cache !== null && !ignoreCache) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) return cached;
    }

    const obj: Record<string, unknown> = {};
    for (const member of entity.members) {
      obj[member.name] = this.readMember(member, record);
    }
    this.cache?.set(cacheKey, obj);
    return obj;
  }

  buildIdentifierOnly(record: NativeRecord, type: string): unknown {
    const pk = this.entity(type).members.find((m) => m.isPrimaryKey === true);
    return keyValue(record.key, pk?.keyForm);
  }

  buildProjection(record: NativeRecord, _type: string, fields: readonly ResolvedField[]): unknown[] {
    return fields.map((field) =>
      field.path.length === 1 ? this.readMember(field.member, record) : convert(field.member, record.properties[field.property]),
    );
  }

  private entity(type: string): EntityDescriptor {
    const entity = this.metadata.entityFor(type);
    if (entity === null) {
      throw new Error(`PlainObjectMaterializer: no metadata for type "${type}"`);
    }
    return entity;
  }

  private readMember(member: MemberDescriptor, record: NativeRecord): unknown {
    if (member.isPrimaryKey === true) return keyValue(record.key, member.keyForm);
    if (member.isAncestorPointer === true) {
      return record.key.parent !== null ? keyValue(record.key.parent, member.keyForm) : null;
    }
    if (member.declaredType === 'relation' && member.relation?.side === 'parent') {
      return record.key.parent;
    }
    if (member.declaredType === 'embedded') {
      // embedded members are stored flat on the owning record
      const sub: Record<string, unknown> = {};
      for (const inner of member.embeddedMembers ?? []) {
        sub[inner.name] = this.readMember(inner, record);
      }
      return sub;
    }
    return convert(member, record.properties[storeNameFor(member)]);
  }
}

function keyValue(key: Key, form: MemberDescriptor['keyForm']): unknown {
  switch (form) {
    case 'encoded':
      return key.encode();
    case 'id':
      return key.id;
    case 'name':
      return key.name;
    case 'key':
    case undefined:
      return key;
  }
}

function convert(member: MemberDescriptor, value: NativeValue | undefined): unknown {
  if (value === undefined || value === null) return null;
  switch (member.declaredType) {
    case 'enum':
      if (typeof value === 'string' && member.enumType !== undefined && value in member.enumType) {
        return member.enumType[value];
      }
      return value;
    case 'bytes':
      return value instanceof ShortBlob ? value.bytes : value;
    case 'date':
      return typeof value === 'string' ? new Date(value) : value;
    case 'list':
      return Array.isArray(value) ? [...value] : [value];
    default:
      return value;
  }
}
