import {Client, expect} from '@loopback/testlab';
import {ProductCatalogApplication} from '../..';
import {setupApplication} from '../helper/test-helper';

describe('Health', () => {
  let app: ProductCatalogApplication;
  let client: Client;

  before('setupApplication', async () => {
    ({app, client} = await setupApplication());
  });

  after(async () => {
    await app.stop();
  });

  it('reports the application as ready', async () => {
    const res = await client.get('/ready').expect(200);
    expect(res.body.status).to.equal('UP');
  });
});
