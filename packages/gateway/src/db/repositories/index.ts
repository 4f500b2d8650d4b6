export * from './base.js';
export * from './user-groups.js';
export * from './users.js';
export * from './permissions.js';
export * from './group-permissions.js';
export * from './user-permissions.js';
export * from './contents.js';
