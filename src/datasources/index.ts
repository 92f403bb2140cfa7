export * from './memory.datasource';
