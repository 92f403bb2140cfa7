import {
  inject,
  lifeCycleObserver,
  LifeCycleObserver,
  service,
} from '@loopback/core';
import {ConfigurationBindings} from '../key';
import {ProductService} from '../services/product.service';
import type {AppCustomCatalogConfig} from '../utils/configuration-utils';

/**
 * Fills an empty catalog with the configured products when the application
 * starts, after the datasources are up.
 */
@lifeCycleObserver('seed')
export class ProductSeedObserver implements LifeCycleObserver {
  constructor(
    @inject(ConfigurationBindings.CATALOG_CONFIG)
    private catalogConfig: AppCustomCatalogConfig,
    @service(ProductService) private productService: ProductService,
  ) {}

  async start(): Promise<void> {
    await this.productService.seedIfEmpty(this.catalogConfig.seedProducts);
  }
}
