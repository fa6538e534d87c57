export * from './helpers/stub-server.helper';
export * from './helpers/printer.helper';
export * from './helpers/fake-command-runner.helper';
export * from './factories/chat.factory';
export * from './factories/config.factory';
export * from './factories/elasticsearch.factory';
