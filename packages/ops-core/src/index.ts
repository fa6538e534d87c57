// Schemas and types
export * from './schemas';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Utils
export * from './utils';

// Constants
export * from './constants';

// Clients
export * from './clients';

// Checks
export * from './checks';

// Output
export * from './output';
