import {model} from '@loopback/repository';
import {ProductDto} from '../dto/product-dto.model';

@model()
export class GetProductResponse extends ProductDto {
  constructor(data?: Partial<GetProductResponse>) {
    super(data);
  }
}
