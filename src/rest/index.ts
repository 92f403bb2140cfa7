export * from './dto/product-dto.model';
export * from './get-product/get-product-response.model';
export * from './list-products/list-products-response.model';
export * from './pagination/paged-response.model';
export * from './pagination/pageable-dto.model';
export * from './pagination/sort-dto.model';
