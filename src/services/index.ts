export * from './error.service';
export * from './mapper.service';
export * from './product.service';
