import {Entity, model, property} from '@loopback/repository';
import {SortableFields} from './pagination/pagination.model';

@model({
  name: 'catalog_product',
})
export class Product extends Entity {
  @property({
    type: 'number',
    id: true,
    generated: true,
  })
  id?: number;

  @property({
    type: 'string',
    required: true,
  })
  name!: string;

  @property({
    type: 'number',
    required: true,
  })
  price!: number;

  constructor(data?: Partial<Product>) {
    super(data);
  }
}

export interface ProductRelations {
  // describe navigational properties here
}

export const PRODUCT_SORTABLE_FIELDS: SortableFields<Product> = {
  id: p => p.id ?? 0,
  name: p => p.name,
  price: p => p.price,
};
