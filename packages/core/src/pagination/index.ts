export { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_OFFSET, MAX_PAGE_SIZE } from './constants.js';
export type {
  ListFilter,
  FilterKind,
  FilterOf,
  UserFilter,
  UserGroupFilter,
  PermissionFilter,
  GroupPermissionFilter,
  UserPermissionFilter,
  ContentFilter,
} from './filters.js';
export { Query, createQuery, type QueryInput, type SortOrder } from './query.js';
export {
  createPagination,
  buildPageLink,
  type Pagination,
  type LinkConfig,
} from './pagination.js';
export { createEnvelope, mapEnvelope, type ResponseEnvelope } from './envelope.js';
