import {model, property} from '@loopback/repository';
import {ProductDto} from '../dto/product-dto.model';
import {PagedResponse} from '../pagination/paged-response.model';

@model()
export class ListProductsResponse extends PagedResponse<ProductDto> {
  @property({
    type: 'array',
    required: true,
    itemType: ProductDto,
  })
  content!: ProductDto[];

  constructor(data?: Partial<ListProductsResponse>) {
    super(data);
  }
}
