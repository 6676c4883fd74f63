import { z } from 'zod';

/** Custom field kinds a workspace can define. */
export const fieldTypeSchema = z.enum([
  'date',
  'text',
  'number',
  'currency',
  'select',
  'multiSelect',
  'multiCollaborator',
  'createdBy',
  'lastUpdatedBy',
  'createdAt',
  'updatedAt',
]);

export const selectOptionSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export const fieldConfigSchema = z
  .object({
    fractionDigits: z.number().int().nullable(),
    currency: z.string(),
    options: z.array(selectOptionSchema),
    includeTime: z.boolean(),
  })
  .partial()
  .passthrough();

/** Custom field definition as listed on a workspace. */
export const fieldSchema = z
  .object({
    object: z.literal('field'),
    id: z.string(),
    type: fieldTypeSchema,
    name: z.string(),
    config: fieldConfigSchema.nullable().optional(),
  })
  .passthrough();

export const contentMetaSchema = z
  .object({
    itemIds: z.array(z.string()),
    fileIds: z.array(z.string()),
  })
  .passthrough();

export const downloadSchema = z.object({ url: z.string(), expiresAt: z.string() }).passthrough();

export const userShape = {
  id: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  avatarUrl: z.string().nullable(),
};

export const teamShape = {
  id: z.string(),
  url: z.string(),
  name: z.string(),
  createdAt: z.string(),
  createdUserId: z.string(),
};

export const workspaceShape = {
  id: z.string(),
  teamId: z.string(),
  name: z.string(),
  createdAt: z.string(),
  createdUserId: z.string(),
  childIds: z.array(z.string()),
  fields: z.array(fieldSchema),
};

const treeEntryShape = {
  id: z.string(),
  workspaceId: z.string(),
  url: z.string(),
  title: z.string(),
  createdAt: z.string(),
  createdUserId: z.string(),
  lastUpdatedAt: z.string(),
  lastUpdatedUserId: z.string(),
};

export const itemShape = {
  ...treeEntryShape,
  fields: z.record(z.unknown()),
  content: z.string().nullable().optional(),
  contentMeta: contentMetaSchema,
  highlight: z.string().nullable().optional(),
};

export const collectionShape = {
  ...treeEntryShape,
  childIds: z.array(z.string()),
};

export const fileShape = {
  id: z.string(),
  itemId: z.string(),
  fileName: z.string(),
  createdAt: z.string(),
  createdUserId: z.string(),
  download: downloadSchema,
};

/** Full payload schemas, keyed by `object` tag, used when response validation is on. */
export const objectSchemas = {
  user: z.object({ object: z.literal('user'), ...userShape }).passthrough(),
  team: z.object({ object: z.literal('team'), ...teamShape }).passthrough(),
  workspace: z.object({ object: z.literal('workspace'), ...workspaceShape }).passthrough(),
  item: z.object({ object: z.literal('item'), ...itemShape }).passthrough(),
  collection: z.object({ object: z.literal('collection'), ...collectionShape }).passthrough(),
  file: z.object({ object: z.literal('file'), ...fileShape }).passthrough(),
  list: z.object({ object: z.literal('list'), results: z.array(z.unknown()) }).passthrough(),
};

export type FieldType = z.infer<typeof fieldTypeSchema>;
export type Field = z.infer<typeof fieldSchema>;
export type ContentMeta = z.infer<typeof contentMetaSchema>;
export type Download = z.infer<typeof downloadSchema>;
