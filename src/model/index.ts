/**
 * Model entrypoint: declarative resource schemas.
 * @module
 */
export {
  defineModel,
  type FieldDescriptor,
  type FieldMap,
  type FieldSchema,
  type InferFields,
  type InferModel,
  type Model,
  optional,
  required,
} from './model.js';
