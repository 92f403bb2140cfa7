import {Client, expect} from '@loopback/testlab';
import {ProductCatalogApplication} from '../../..';
import {setupApplication} from '../../helper/test-helper';

describe('Get product', () => {
  let app: ProductCatalogApplication;
  let client: Client;

  before('setupApplication', async () => {
    ({app, client} = await setupApplication());
  });

  after(async () => {
    await app.stop();
  });

  it('should return the seeded product', async () => {
    const res = await client
      .get('/products/3')
      .expect(200)
      .expect('Content-Type', /application\/json/);

    expect(res.body).to.deepEqual({
      id: 3,
      name: 'product_C',
      price: 3,
    });
  });

  it('should return 404 for an unknown product', async () => {
    const res = await client.get('/products/99').expect(404);
    expect(res.body.error.message).to.equal('Product not found: 99');
  });

  it('should return 404 for id 0', async () => {
    const res = await client.get('/products/0').expect(404);
    expect(res.body.error.message).to.equal('Product not found: 0');
  });

  it('should return 400 for a malformed id', async () => {
    await client.get('/products/abc').expect(400);
  });
});
