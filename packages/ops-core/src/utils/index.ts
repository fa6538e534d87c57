export * from './json.utils';
export * from './time.utils';
