import type { StandardSchemaV1 } from '@standard-schema/spec';
import { type Codec, isJsonObject, type NestedModel } from '../codec/codecs.js';
import { DecodeError } from '../error/decodeError.js';
import type { JsonObject } from '../types/json.js';
import type { SafeWrap } from '../utils/wrap.js';

/** How one field is declared in {@link defineModel}. */
export interface FieldDescriptor<T, Required extends boolean> {
  readonly codec: Codec<T>;
  readonly required: Required;
}

/** Immutable description of one field of a model. */
export interface FieldSchema {
  readonly name: string;
  readonly codec: Codec<unknown>;
  readonly required: boolean;
}

/** Field name to descriptor, in wire order. */
export type FieldMap = Record<string, FieldDescriptor<unknown, boolean>>;

type DescriptorValue<D> = D extends FieldDescriptor<infer T, boolean> ? T : never;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** Typed object produced by materializing a model built from `F`. */
export type InferFields<F extends FieldMap> = Simplify<
  { readonly [K in keyof F as F[K] extends FieldDescriptor<unknown, true> ? K : never]: DescriptorValue<F[K]> } & {
    readonly [K in keyof F as F[K] extends FieldDescriptor<unknown, true> ? never : K]?: DescriptorValue<F[K]>;
  }
>;

/** Typed object produced by a model. */
export type InferModel<M> = M extends Model<infer T> ? T : never;

/** Field that must be present and non-null. */
export function required<T>(codec: Codec<T>): FieldDescriptor<T, true> {
  return Object.freeze({ codec, required: true });
}

/** Field that may be missing or null; either way it materializes as absent. */
export function optional<T>(codec: Codec<T>): FieldDescriptor<T, false> {
  return Object.freeze({ codec, required: false });
}

/**
 * Declarative schema for one resource type.
 *
 * Also a Standard Schema, so it can be handed to anything that consumes one.
 */
export interface Model<T> extends NestedModel<T>, StandardSchemaV1<unknown, T> {
  /** Resource name used in error messages */
  readonly name: string;
  /** Fields in declaration order */
  readonly fields: readonly FieldSchema[];
  /**
   * Applies the schema to one raw JSON object. Fails fast on the first bad field.
   * Unknown keys are ignored; the result is frozen.
   */
  materialize(raw: unknown): SafeWrap<DecodeError, T>;
  /** Encodes every present field in declaration order, omitting absent ones. */
  serialize(value: T): JsonObject;
}

class ResourceModel<T> implements Model<T> {
  readonly name: string;
  readonly fields: readonly FieldSchema[];
  readonly '~standard': StandardSchemaV1.Props<unknown, T>;

  constructor(name: string, fields: readonly FieldSchema[]) {
    this.name = name;
    this.fields = fields;
    this['~standard'] = {
      version: 1,
      vendor: 'rapidpro-client',
      validate: (value: unknown): StandardSchemaV1.Result<T> => {
        const [err, data] = this.materialize(value);
        if (err) {
          return { issues: [{ message: err.message, path: [...err.path] }] };
        }

        return { value: data };
      },
    };
    Object.freeze(this);
  }

  materialize(raw: unknown): SafeWrap<DecodeError, T> {
    if (!isJsonObject(raw)) {
      return [new DecodeError('expected object', raw, { model: this.name }), null];
    }

    const out: Record<string, unknown> = {};
    for (const field of this.fields) {
      const value = raw[field.name];
      if (value === undefined || value === null) {
        if (field.required) {
          const reason = value === undefined ? 'required field missing' : 'required field is null';
          return [new DecodeError(reason, value, { model: this.name, path: [field.name] }), null];
        }

        out[field.name] = undefined;
        continue;
      }

      const [err, decoded] = field.codec.decode(value);
      if (err) {
        return [err.at(field.name, this.name), null];
      }

      out[field.name] = decoded;
    }

    // Every declared field was decoded by its codec above, which is what T describes.
    return [null, Object.freeze(out) as T];
  }

  serialize(value: T): JsonObject {
    const out: JsonObject = {};
    if (typeof value !== 'object' || value === null) {
      return out;
    }

    for (const field of this.fields) {
      const entry: unknown = Reflect.get(value, field.name);
      if (entry === undefined || entry === null) {
        continue;
      }

      out[field.name] = field.codec.encode(entry);
    }

    return out;
  }
}

/**
 * Builds a frozen model from field descriptors. Declaration order is the
 * order fields are decoded and serialized in.
 *
 * @example
 * const Group = defineModel('Group', {
 *   uuid: required(identifier()),
 *   name: required(string()),
 *   count: optional(integer()),
 * });
 * type Group = InferModel<typeof Group>;
 */
export function defineModel<F extends FieldMap>(name: string, fields: F): Model<InferFields<F>> {
  const schemas = Object.entries(fields).map(([field, descriptor]) =>
    Object.freeze({ name: field, codec: descriptor.codec, required: descriptor.required }),
  );

  return new ResourceModel<InferFields<F>>(name, Object.freeze(schemas));
}
