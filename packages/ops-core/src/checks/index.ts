export * from './check-result';
export * from './content-checks';
export * from './http-checks';
export * from './index-checks';
export * from './matrix-checks';
export * from './sse-checks';
