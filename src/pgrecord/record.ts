// record.ts

import type { FieldAccessor, HostKind, RecordLike } from "./model-types.js";

/** An annotation string, or annotations keyed by annotation key: { pg: "type=uuid,primary" } */
export type FieldTags = string | Readonly<Record<string, string>>;

export interface FieldOptions {
  /** Host representation; drives the default column type when no `type=` is given */
  host?: HostKind | undefined;
  /** The field accepts null/undefined */
  optional?: boolean | undefined;
  /** Custom database value decoder, applied when scanning rows */
  decode?: ((value: unknown) => unknown) | undefined;
  /** Column comment */
  description?: string | undefined;
}

export interface RecordField<T> extends FieldAccessor<T> {
  readonly kind: "field";
  readonly tags: FieldTags | undefined;
  readonly description: string;
}

export interface EmbeddedField<T> {
  readonly kind: "embedded";
  readonly name: string;
  readonly tags: FieldTags | undefined;
  /** The composite value bound as a single column (json, or a leaf with no eligible fields) */
  readonly self: RecordField<T>;
  /** Nested members, re-rooted at the outer record */
  readonly members: readonly RecordMember<T>[];
}

export type RecordMember<T> = RecordField<T> | EmbeddedField<T>;

export function tagFor(tags: FieldTags | undefined, tagKey: string): string | undefined {
  if (tags === undefined || typeof tags === "string") return tags;
  return tags[tagKey];
}

/* ---------- RE-ROOTING NESTED MEMBERS ---------- */

function isPresent<V>(value: V): value is NonNullable<V> {
  return value !== null && value !== undefined;
}

function rebaseField<T, E>(
  field: RecordField<E>,
  prefix: string,
  read: (record: T) => E | undefined,
  ensure: (record: T) => E
): RecordField<T> {
  return {
    kind: "field",
    name: field.name,
    path: [prefix, ...field.path],
    tags: field.tags,
    description: field.description,
    host: field.host,
    optional: field.optional,
    decode: field.decode,
    get: (record) => {
      const inner = read(record);
      return inner === undefined ? undefined : field.get(inner);
    },
    set: (record, value) => field.set(ensure(record), value),
  };
}

function rebaseMember<T, E>(
  member: RecordMember<E>,
  prefix: string,
  read: (record: T) => E | undefined,
  ensure: (record: T) => E
): RecordMember<T> {
  if (member.kind === "field") {
    return rebaseField(member, prefix, read, ensure);
  }

  return {
    kind: "embedded",
    name: member.name,
    tags: member.tags,
    self: rebaseField(member.self, prefix, read, ensure),
    members: member.members.map((m) => rebaseMember(m, prefix, read, ensure)),
  };
}

/**
 * Static field-accessor table for one record shape.
 *
 * ```ts
 * const blogType = new RecordType<Blog>("Blog", () => ({ id: "", name: "" }))
 *   .field("id", "type=uuid,primary")
 *   .field("name", "type=varchar(255)");
 * ```
 */
export class RecordType<T extends RecordLike> {
  private readonly memberList: RecordMember<T>[] = [];
  private tableDescription = "";

  constructor(
    readonly name: string,
    readonly create: () => T
  ) {}

  get members(): readonly RecordMember<T>[] {
    return this.memberList;
  }

  get description(): string {
    return this.tableDescription;
  }

  /** Table comment */
  describe(description: string): this {
    this.tableDescription = description;
    return this;
  }

  field<K extends keyof T & string>(
    key: K,
    tags?: FieldTags,
    options: FieldOptions = {}
  ): this {
    this.memberList.push({
      kind: "field",
      name: key,
      path: [key],
      tags,
      description: options.description ?? "",
      host: options.host ?? "unknown",
      optional: options.optional ?? false,
      decode: options.decode,
      get: (record) => record[key],
      set: (record, value) => {
        Object.assign(record, { [key]: value });
      },
    });
    return this;
  }

  /** A composite field whose own fields are promoted into this record's columns. */
  embed<K extends keyof T & string>(
    key: K,
    nested: RecordType<NonNullable<T[K]>>,
    tags?: FieldTags,
    options: Pick<FieldOptions, "optional"> = {}
  ): this {
    const read = (record: T): NonNullable<T[K]> | undefined => {
      const inner = record[key];
      return isPresent(inner) ? inner : undefined;
    };

    const ensure = (record: T): NonNullable<T[K]> => {
      const inner = read(record);
      if (inner !== undefined) return inner;

      const created = nested.create();
      Object.assign(record, { [key]: created });
      return created;
    };

    const self: RecordField<T> = {
      kind: "field",
      name: key,
      path: [key],
      tags,
      description: "",
      host: "json",
      optional: options.optional ?? false,
      get: (record) => record[key],
      set: (record, value) => {
        Object.assign(record, { [key]: value });
      },
    };

    this.memberList.push({
      kind: "embedded",
      name: key,
      tags,
      self,
      members: nested.members.map((m) => rebaseMember(m, key, read, ensure)),
    });
    return this;
  }
}
