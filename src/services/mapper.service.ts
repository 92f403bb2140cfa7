import {injectable} from '@loopback/core';
import {Page, Product, SortOrder} from '../models';
import {
  GetProductResponse,
  ListProductsResponse,
  PageableDto,
  ProductDto,
  SortDto,
} from '../rest';

@injectable()
export class MapperService {
  constructor() {
    // NOP
  }

  public toProductDto(entity: Product): ProductDto {
    return new ProductDto({
      id: entity.id,
      name: entity.name,
      price: entity.price,
    });
  }

  public toGetProductResponse(entity: Product): GetProductResponse {
    return new GetProductResponse(this.toProductDto(entity));
  }

  public toListProductsResponse(page: Page<Product>): ListProductsResponse {
    const sort = this.toSortDto(page.sort);

    return new ListProductsResponse({
      content: page.content.map(o => this.toProductDto(o)),
      pageable: new PageableDto({
        sort,
        offset: page.offset,
        pageNumber: page.number,
        pageSize: page.size,
        paged: true,
        unpaged: false,
      }),
      last: page.last,
      totalPages: page.totalPages,
      totalElements: page.totalElements,
      size: page.size,
      number: page.number,
      sort,
      first: page.first,
      numberOfElements: page.numberOfElements,
      empty: page.empty,
    });
  }

  public toSortDto(sort: SortOrder | undefined): SortDto {
    return new SortDto({
      sorted: !!sort,
      unsorted: !sort,
      empty: !sort,
    });
  }
}
