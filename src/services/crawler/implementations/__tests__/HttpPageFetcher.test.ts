import nock from 'nock';
import { HttpPageFetcher } from '../HttpPageFetcher';
import { FetchErrorKind } from '../../interfaces/types';

describe('HttpPageFetcher', () => {
  const origin = 'https://shop.test';
  let fetcher: HttpPageFetcher;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    fetcher = new HttpPageFetcher();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should return the HTML of a page', async () => {
    nock(origin)
      .get('/dresses')
      .reply(200, '<html><body>Dresses</body></html>', { 'Content-Type': 'text/html; charset=utf-8' });

    await expect(fetcher.fetch(`${origin}/dresses`)).resolves.toEqual({
      ok: true,
      html: '<html><body>Dresses</body></html>',
      status: 200,
      finalUrl: `${origin}/dresses`
    });
  });

  it('should report the URL a redirect ended on', async () => {
    nock(origin)
      .get('/old-dresses')
      .reply(301, '', { Location: `${origin}/dresses` })
      .get('/dresses')
      .reply(200, '<html><body>Dresses</body></html>', { 'Content-Type': 'text/html' });

    const result = await fetcher.fetch(`${origin}/old-dresses`);

    expect(result).toEqual({
      ok: true,
      html: '<html><body>Dresses</body></html>',
      status: 200,
      finalUrl: `${origin}/dresses`
    });
  });

  it('should send the configured user agent', async () => {
    const scope = nock(origin, { reqheaders: { 'user-agent': 'TestBot/2.0' } })
      .get('/')
      .reply(200, '<html></html>', { 'Content-Type': 'text/html' });

    const result = await fetcher.fetch(`${origin}/`, { userAgent: 'TestBot/2.0' });

    expect(result.ok).toBe(true);
    expect(scope.isDone()).toBe(true);
  });

  it.each([404, 403, 500, 503])('should map HTTP %i to an http error with its status', async status => {
    nock(origin).get('/page').reply(status, 'error', { 'Content-Type': 'text/html' });

    await expect(fetcher.fetch(`${origin}/page`)).resolves.toEqual({
      ok: false,
      error: { kind: FetchErrorKind.HTTP_ERROR, status, message: `HTTP ${status} for ${origin}/page` }
    });
  });

  it('should reject content that is not HTML', async () => {
    nock(origin).get('/feed.json').reply(200, '{}', { 'Content-Type': 'application/json' });

    await expect(fetcher.fetch(`${origin}/feed.json`)).resolves.toEqual({
      ok: false,
      error: {
        kind: FetchErrorKind.NON_HTML_CONTENT,
        status: 200,
        message: `Non-HTML content at ${origin}/feed.json (Content-Type: application/json)`
      }
    });
  });

  it('should accept XHTML', async () => {
    nock(origin).get('/page').reply(200, '<html></html>', { 'Content-Type': 'application/xhtml+xml' });

    const result = await fetcher.fetch(`${origin}/page`);

    expect(result.ok).toBe(true);
  });

  it('should report a timeout', async () => {
    nock(origin).get('/slow').delay(500).reply(200, '<html></html>', { 'Content-Type': 'text/html' });

    await expect(fetcher.fetch(`${origin}/slow`, { timeout: 50 })).resolves.toEqual({
      ok: false,
      error: { kind: FetchErrorKind.TIMEOUT, message: `Timeout fetching ${origin}/slow` }
    });
  });

  it('should report connection failures as transport errors', async () => {
    nock(origin).get('/down').replyWithError('connect ECONNREFUSED');

    await expect(fetcher.fetch(`${origin}/down`)).resolves.toEqual({
      ok: false,
      error: {
        kind: FetchErrorKind.TRANSPORT_ERROR,
        message: `Error fetching ${origin}/down: connect ECONNREFUSED`
      }
    });
  });

  it('should reject URLs that are not http(s) without a request', async () => {
    await expect(fetcher.fetch('ftp://shop.test/file')).resolves.toEqual({
      ok: false,
      error: { kind: FetchErrorKind.INVALID_URL, message: 'Invalid URL: ftp://shop.test/file' }
    });
  });
});
