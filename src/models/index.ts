/**
 * Models entrypoint: the domain object classes, their schemas and narrowing helpers.
 * @module
 */
export { File } from './file.js';
export { Collection, Item } from './item.js';
export {
  type DeleteResponse,
  expectDeleted,
  expectModel,
  expectModels,
  isDeleteResponse,
  isModel,
} from './narrow.js';
export { NuclinoObject } from './object.js';
export {
  type ContentMeta,
  type Download,
  type Field,
  type FieldType,
  fieldSchema,
  objectSchemas,
} from './schemas.js';
export { Team } from './team.js';
export type { AnyNuclinoObject, ModelOf, ObjectTag } from './types.js';
export { User } from './user.js';
export { Workspace } from './workspace.js';
