import { DefaultLinkExtractor } from '../DefaultLinkExtractor';

describe('DefaultLinkExtractor', () => {
  let extractor: DefaultLinkExtractor;

  beforeEach(() => {
    extractor = new DefaultLinkExtractor();
  });

  describe('extract', () => {
    it('should resolve absolute, root-relative and relative links against the page URL', () => {
      const html = `
        <html>
          <body>
            <a href="https://shop.test/women">Women</a>
            <a href="/men">Men</a>
            <a href="sale">Sale</a>
            <a href="../root">Root</a>
          </body>
        </html>
      `;

      expect(extractor.extract(html, 'https://shop.test/collections/summer')).toEqual([
        'https://shop.test/women',
        'https://shop.test/men',
        'https://shop.test/collections/sale',
        'https://shop.test/root'
      ]);
    });

    it('should keep links of the same site with or without www', () => {
      const html = `
        <a href="https://www.shop.test/a">A</a>
        <a href="https://cdn.shop.test/b">B</a>
        <a href="https://other.test/c">C</a>
      `;

      expect(extractor.extract(html, 'https://shop.test/')).toEqual(['https://www.shop.test/a']);
    });

    it('should skip script, mail, phone and fragment-only links', () => {
      const html = `
        <a href="https://shop.test/page1">Valid</a>
        <a href="javascript:void(0)">Script</a>
        <a href="mailto:test@shop.test">Mail</a>
        <a href="tel:+100000000">Phone</a>
        <a href="#reviews">Fragment</a>
        <a href="">Empty</a>
        <a>No href</a>
      `;

      expect(extractor.extract(html, 'https://shop.test')).toEqual(['https://shop.test/page1']);
    });

    it('should strip fragments and trailing slashes and drop duplicates', () => {
      const html = `
        <a href="/product/red-dress#details">One</a>
        <a href="/product/red-dress/">Two</a>
        <a href="/product/red-dress">Three</a>
      `;

      expect(extractor.extract(html, 'https://shop.test')).toEqual(['https://shop.test/product/red-dress']);
    });

    it('should keep query strings', () => {
      const html = '<a href="/dresses?page=2">Next</a>';

      expect(extractor.extract(html, 'https://shop.test/dresses')).toEqual(['https://shop.test/dresses?page=2']);
    });

    it('should return an empty list for markup without anchors', () => {
      expect(extractor.extract('<html><unclosed>', 'https://shop.test')).toEqual([]);
    });
  });
});
