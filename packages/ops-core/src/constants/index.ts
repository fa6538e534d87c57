export * from './limits';
export * from './probes';
