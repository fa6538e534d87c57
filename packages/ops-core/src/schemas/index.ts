// Re-export all schemas and types
export * from './config.schema';
export * from './elasticsearch.schema';
export * from './chat.schema';
export * from './report.schema';
export * from './phrase-matrix.schema';
