export * from './configuration-utils';
export * from './object-utils';
export * from './pagination-utils';
export * from './string-utils';
