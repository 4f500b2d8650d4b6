/**
 * Route exports
 */

export { createHealthRoutes } from './health.js';
export { createAuthRoutes } from './auth.js';
export { createUserGroupRoutes } from './user-groups.js';
export { createUserRoutes } from './users.js';
export { createPermissionRoutes } from './permissions.js';
export { createGroupPermissionRoutes } from './group-permissions.js';
export { createUserPermissionRoutes } from './user-permissions.js';
export { createContentRoutes } from './contents.js';
