/**
 * List filters
 *
 * One tagged variant per entity. Each variant carries only the fields its
 * list predicate understands; an absent field places no restriction on the
 * listing.
 */

export interface UserFilter {
  readonly kind: 'user';
  readonly userGroupId?: string;
}

export interface UserGroupFilter {
  readonly kind: 'userGroup';
  /** Case-insensitive substring match on group_name */
  readonly groupName?: string;
}

export interface PermissionFilter {
  readonly kind: 'permission';
  /** Case-insensitive substring match on name */
  readonly name?: string;
}

export interface GroupPermissionFilter {
  readonly kind: 'groupPermission';
  readonly groupId?: string;
  readonly permissionId?: string;
}

export interface UserPermissionFilter {
  readonly kind: 'userPermission';
  readonly userId?: string;
  readonly permissionId?: string;
}

export interface ContentFilter {
  readonly kind: 'content';
  readonly authorId?: string;
}

export type ListFilter =
  | UserFilter
  | UserGroupFilter
  | PermissionFilter
  | GroupPermissionFilter
  | UserPermissionFilter
  | ContentFilter;

export type FilterKind = ListFilter['kind'];

/** Narrow a filter union member by its tag */
export type FilterOf<K extends FilterKind> = Extract<ListFilter, { kind: K }>;
