import {inject} from '@loopback/core';
import {MemoryDataSource} from '../datasources/memory.datasource';
import {Product, ProductRelations} from '../models';
import {PaginationRepository} from './proto';

export class ProductRepository extends PaginationRepository<
  Product,
  typeof Product.prototype.id,
  ProductRelations
> {
  constructor(@inject('datasources.Memory') dataSource: MemoryDataSource) {
    super(Product, dataSource);
  }
}
