import type { SearchTerm } from '../sources/search-client.js';
import searchKeywords from './search-keywords.json';

/** Retail price bands, each walked most expensive first */
const PRICE_BANDS: Array<[number, number | null]> = [
  [0, 50],
  [50, 200],
  [200, 1000],
  [1000, null],
];

export function termsFromKeywords(keywords: readonly string[]): SearchTerm[] {
  const seen = new Set<string>();
  const terms: SearchTerm[] = [];
  for (const raw of keywords) {
    const q = raw.trim();
    const key = q.toLowerCase();
    if (!q || seen.has(key)) continue;
    seen.add(key);
    terms.push({ label: `kw:${key}`, q });
  }
  return terms;
}

export function priceBandTerms(): SearchTerm[] {
  return PRICE_BANDS.map(([min, max]) => ({
    label: max === null ? `retail:${min}+` : `retail:${min}-${max}`,
    q: '*',
    sortBy: 'retail_price:desc',
    filterBy: max === null ? `retail_price:>=${min}` : `retail_price:[${min}..${max}]`,
  }));
}

/**
 * Wildcard, keyword terms and retail-price bands. The index caps how deep a
 * single query can page, so overlapping slices are what reach the whole catalog.
 */
export function defaultSearchTerms(keywords: readonly string[] = searchKeywords): SearchTerm[] {
  return [
    { label: 'all', q: '*' },
    { label: 'all:closing-soon', q: '*', sortBy: 'expected_close_date:asc' },
    ...termsFromKeywords(keywords),
    ...priceBandTerms(),
  ];
}
