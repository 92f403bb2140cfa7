export * from './pagination/pagination.model';
export * from './product.model';
