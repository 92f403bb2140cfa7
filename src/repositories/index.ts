export * from './product.repository';
export * from './proto';
