export { FileEndpoints } from './file.js';
export {
  type CreateCollectionParams,
  type CreateItemParams,
  type GetItemsParams,
  ItemEndpoints,
  type Placement,
  type UpdateCollectionParams,
  type UpdateItemParams,
} from './item.js';
export { type PageParams, TeamEndpoints } from './team.js';
export { UserEndpoints } from './user.js';
export { type GetWorkspacesParams, WorkspaceEndpoints } from './workspace.js';
