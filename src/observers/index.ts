export * from './product-seed.observer';
