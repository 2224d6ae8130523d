import { ResultCollector } from '../ResultCollector';
import { InMemoryDomainStateStore } from '../InMemoryDomainStateStore';
import { DomainStatus } from '../../interfaces/types';

describe('ResultCollector', () => {
  let store: InMemoryDomainStateStore;
  let collector: ResultCollector;

  beforeEach(() => {
    store = new InMemoryDomainStateStore();
    collector = new ResultCollector(store);
  });

  it('should list every known domain, including those without products', () => {
    store.ensure('empty.test');
    store.tryVisit('shop.test', 'https://shop.test/product/a', true, 10);

    expect(collector.snapshot()).toEqual({
      'empty.test': [],
      'shop.test': ['https://shop.test/product/a']
    });
  });

  it('should not expose crawl state through a snapshot', () => {
    store.tryVisit('shop.test', 'https://shop.test/product/a', true, 10);

    collector.snapshot()['shop.test'].push('https://shop.test/injected');

    expect(collector.snapshot()['shop.test']).toEqual(['https://shop.test/product/a']);
  });

  it('should report every domain', () => {
    store.ensure('shop.test');
    store.setStatus('shop.test', DomainStatus.COMPLETED);

    expect(collector.getDomainReports().map(report => [report.domain, report.status])).toEqual([
      ['shop.test', DomainStatus.COMPLETED]
    ]);
  });
});
