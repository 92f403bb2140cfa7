import {expect} from '@loopback/testlab';
import {ConfigurationUtils, StringUtils} from '../../../utils';

describe('Configuration Utils (unit)', () => {
  describe('format()', () => {
    it('replaces placeholders with computed values', () => {
      const computed: {[key: string]: string} = {'env.HOST': 'example.test'};

      const raw = 'http://${env.HOST}:${env.PORT:3000}/${env.HOST}';

      expect(
        StringUtils.format(raw, k => (k in computed ? computed[k] : null)),
      ).to.equal('http://example.test:3000/example.test');
    });

    it('throws on a missing value without default', () => {
      expect(() => StringUtils.format('${env.MISSING}', () => null)).to.throw(
        'Missing required environment variable env.MISSING',
      );
    });
  });

  describe('resolveProperty()', () => {
    const key = 'PRODUCT_CATALOG_UNIT_TEST_VALUE';

    afterEach(() => {
      delete process.env[key];
    });

    it('reads environment variables', () => {
      process.env[key] = 'say "hi"';
      expect(ConfigurationUtils.resolveProperty('env.' + key)).to.equal(
        'say \\"hi\\"',
      );
    });

    it('returns null for unknown sources and unset variables', () => {
      expect(ConfigurationUtils.resolveProperty('sys.' + key)).to.be.null();
      expect(ConfigurationUtils.resolveProperty('env.' + key)).to.be.null();
    });
  });

  describe('buildConfiguration()', () => {
    it('merges the profile over the common configuration', () => {
      const config = ConfigurationUtils.buildConfiguration('acceptance');

      expect(config.envName).to.equal('acceptance');
      expect(config.appCode).to.equal('PRODUCTCATALOG');
      expect(config.logging.rootLevel).to.equal('error');
      expect(config.logging.enableHttpAccessLog).to.be.false();
      expect(config.pagination).to.deepEqual({
        defaultPageSize: 100,
        maxPageSize: 2000,
      });
      expect(config.catalog.seedProducts).to.have.length(4);
    });

    it('throws on an unknown profile', () => {
      expect(() => ConfigurationUtils.buildConfiguration('nowhere')).to.throw(
        /Missing profile configuration/,
      );
    });
  });
});
