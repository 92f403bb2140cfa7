export * from './ping.controller';
export * from './product.controller';
