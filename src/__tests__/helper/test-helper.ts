import {Client, createRestAppClient} from '@loopback/testlab';

import {ProductCatalogApplication} from '../..';
import {ProductRepository} from '../../repositories';
import {ProductService} from '../../services';
import {ConfigurationUtils} from '../../utils/configuration-utils';

export const testConfig = ConfigurationUtils.buildConfiguration('acceptance');

export async function setupApplication(): Promise<AppWithClient> {
  const app = new ProductCatalogApplication({
    ...testConfig,
  });

  await app.start();

  const client = createRestAppClient(app);

  return {app, client};
}

export interface AppWithClient {
  app: ProductCatalogApplication;
  client: Client;
}

export async function getProductRepository(
  app: ProductCatalogApplication,
): Promise<ProductRepository> {
  return app.getRepository(ProductRepository);
}

export async function getProductService(
  app: ProductCatalogApplication,
): Promise<ProductService> {
  return app.get<ProductService>('services.ProductService');
}
