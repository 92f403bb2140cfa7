import {inject, injectable, service} from '@loopback/core';
import type {WinstonLogger} from '@loopback/logging';
import {repository} from '@loopback/repository';
import {HttpErrors} from '@loopback/rest';
import {ConfigurationBindings, LoggerBindings} from '../key';
import {PRODUCT_SORTABLE_FIELDS, Product} from '../models';
import {ProductRepository} from '../repositories';
import {GetProductResponse, ListProductsResponse} from '../rest';
import type {
  AppCustomPaginationConfig,
  AppCustomSeedProduct,
} from '../utils/configuration-utils';
import {PaginationUtils} from '../utils/pagination-utils';
import {MapperService} from './mapper.service';

@injectable()
export class ProductService {
  logPrefix = '[product] ';

  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.PAGINATION_CONFIG)
    private paginationConfig: AppCustomPaginationConfig,
    @repository(ProductRepository)
    private productRepository: ProductRepository,
    @service(MapperService) private mapperService: MapperService,
  ) {}

  public async list(
    page: number | undefined,
    size: number | undefined,
    sort: string | undefined,
  ): Promise<ListProductsResponse> {
    const pageable = PaginationUtils.parsePagination(
      page,
      size,
      sort,
      this.paginationConfig,
    );

    this.logger.debug(
      `${this.logPrefix}listing page ${pageable.page} of size ${pageable.size}` +
        (pageable.sort
          ? ` sorted by ${pageable.sort.property} ${pageable.sort.direction}`
          : ''),
    );

    const products = await this.productRepository.findPage(
      {
        order: ['id ASC'],
      },
      pageable,
      PRODUCT_SORTABLE_FIELDS,
    );

    return this.mapperService.toListProductsResponse(products);
  }

  public async fetch(id: number): Promise<Product> {
    const entity = await this.productRepository.findOne({
      where: {
        id,
      },
    });

    if (!entity) {
      throw new HttpErrors.NotFound('Product not found: ' + id);
    }
    return entity;
  }

  public async getProduct(id: number): Promise<GetProductResponse> {
    const entity = await this.fetch(id);
    return this.mapperService.toGetProductResponse(entity);
  }

  /**
   * Stores the given products, in order, unless the catalog already holds
   * some. Returns the number of created products.
   */
  public async seedIfEmpty(products: AppCustomSeedProduct[]): Promise<number> {
    const existing = await this.productRepository.count();
    if (existing.count > 0) {
      this.logger.debug(
        `${this.logPrefix}catalog already holds ${existing.count} products, skipping seed`,
      );
      return 0;
    }

    for (const product of products) {
      await this.productRepository.create(
        new Product({
          name: product.name,
          price: product.price,
        }),
      );
    }

    this.logger.info(`${this.logPrefix}seeded ${products.length} products`);
    return products.length;
  }
}
