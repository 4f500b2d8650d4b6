export * from './timestamps.js';
export * from './user-group.js';
export * from './user.js';
export * from './permission.js';
export * from './permission-link.js';
export * from './content.js';
