import {model, Model, property} from '@loopback/repository';

@model()
export class ProductDto extends Model {
  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int64',
    },
  })
  id!: number;

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

  constructor(data?: Partial<ProductDto>) {
    super(data);
  }
}
