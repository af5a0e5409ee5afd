export * from './roles';
export * from './workflow';
export * from './comments';
export * from './notifications';
export * from './messages';
export * from './errors';
