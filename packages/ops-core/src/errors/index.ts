export * from './base.error';
export * from './check.error';
export * from './command.error';
export * from './config.error';
export * from './read-only.error';
export * from './readiness.error';
