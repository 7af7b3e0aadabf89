import { defaultSearchTerms, priceBandTerms, termsFromKeywords } from '../../src/config/search-terms.js';

describe('search terms', () => {
  it('dedupes keywords case-insensitively and drops blanks', () => {
    expect(termsFromKeywords(['Drill', ' drill ', '', 'Air Fryer'])).toEqual([
      { label: 'kw:drill', q: 'Drill' },
      { label: 'kw:air fryer', q: 'Air Fryer' },
    ]);
  });

  it('slices the catalog into retail price bands', () => {
    expect(priceBandTerms().map((t) => [t.label, t.filterBy])).toEqual([
      ['retail:0-50', 'retail_price:[0..50]'],
      ['retail:50-200', 'retail_price:[50..200]'],
      ['retail:200-1000', 'retail_price:[200..1000]'],
      ['retail:1000+', 'retail_price:>=1000'],
    ]);
  });

  it('starts with the wildcard terms and ends with the price bands', () => {
    const terms = defaultSearchTerms(['lamp']);

    expect(terms.map((t) => t.label)).toEqual([
      'all',
      'all:closing-soon',
      'kw:lamp',
      'retail:0-50',
      'retail:50-200',
      'retail:200-1000',
      'retail:1000+',
    ]);
    expect(terms[1].sortBy).toBe('expected_close_date:asc');
  });

  it('ships a keyword list by default', () => {
    const labels = defaultSearchTerms().map((t) => t.label);

    expect(labels.length).toBeGreaterThan(20);
    expect(new Set(labels).size).toBe(labels.length);
  });
});
