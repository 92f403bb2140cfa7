export * from './pagination-repository.proto';
