import {service} from '@loopback/core';
import {get, getModelSchemaRef, param} from '@loopback/rest';
import {GetProductResponse} from '../rest/get-product/get-product-response.model';
import {ListProductsResponse} from '../rest/list-products/list-products-response.model';
import {ProductService} from '../services/product.service';

const OAS_CONTROLLER_NAME = 'Product';

export class ProductController {
  constructor(
    @service(ProductService) private productService: ProductService,
  ) {}

  @get('/products', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'listProducts',
    responses: {
      '200': {
        description: 'Page of the product catalog',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListProductsResponse, {
              title: 'ListProductsResponse',
            }),
          },
        },
      },
    },
  })
  async listProducts(
    @param.query.integer('page', {
      required: false,
      description: 'Zero-based page index',
    })
    page?: number,
    @param.query.integer('size', {
      required: false,
      description: 'Page size',
    })
    size?: number,
    @param.query.string('sort', {
      required: false,
      description: 'Sort expression: property[,ASC|DESC]',
    })
    sort?: string,
  ): Promise<ListProductsResponse> {
    return this.productService.list(page, size, sort);
  }

  @get('/products/{id}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getProduct',
    responses: {
      '200': {
        description: 'Product detail',
        content: {
          'application/json': {
            schema: getModelSchemaRef(GetProductResponse, {
              title: 'GetProductResponse',
            }),
          },
        },
      },
    },
  })
  async getProduct(
    @param.path.integer('id') id: number,
  ): Promise<GetProductResponse> {
    return this.productService.getProduct(id);
  }
}
