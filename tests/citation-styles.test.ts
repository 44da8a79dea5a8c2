import { describe, it, expect } from 'vitest';
import { displayDomain, formatCitation, isCitationStyle, isUrl } from '../src/citations/styles';
import { CitationStyle } from '../src/citations/types';

const ACCESSED = new Date(Date.UTC(2026, 9, 5));

describe('displayDomain', () => {
  it('drops www and capitalizes each label', () => {
    expect(displayDomain('https://www.example.co.uk/a')).toBe('Example.Co.Uk');
    expect(displayDomain('http://data.example.com')).toBe('Data.Example.Com');
  });
});

describe('isUrl', () => {
  it('accepts http and https only', () => {
    expect(isUrl('https://example.com')).toBe(true);
    expect(isUrl('ftp://example.com')).toBe(false);
    expect(isUrl('market survey')).toBe(false);
  });
});

describe('formatCitation', () => {
  it('formats URLs in APA style', () => {
    expect(formatCitation('https://www.example.co.uk/a', 1, CitationStyle.APA, ACCESSED)).toEqual({
      id: 1,
      source: 'https://www.example.co.uk/a',
      formatted: 'Example.Co.Uk. Retrieved October 05, 2026, from https://www.example.co.uk/a',
      url: 'https://www.example.co.uk/a',
      accessed: '2026-10-05',
      style: 'apa',
    });
  });

  it('formats URLs in MLA style', () => {
    expect(formatCitation('https://example.com/x', 1, CitationStyle.MLA, ACCESSED).formatted).toBe(
      '"Example.Com." Web. 05 Oct 2026.'
    );
  });

  it('formats URLs in Chicago style', () => {
    expect(
      formatCitation('https://example.com/x', 1, CitationStyle.CHICAGO, ACCESSED).formatted
    ).toBe('Example.Com, accessed October 05, 2026, https://example.com/x.');
  });

  it('formats plain labels in every style', () => {
    const label = 'market survey';
    const apa = formatCitation(label, 2, CitationStyle.APA, ACCESSED);

    expect(apa.formatted).toBe('market survey. (2026). Research data.');
    expect(apa.url).toBeNull();
    expect(formatCitation(label, 2, CitationStyle.MLA, ACCESSED).formatted).toBe(
      '"market survey." Research Data, 2026.'
    );
    expect(formatCitation(label, 2, CitationStyle.CHICAGO, ACCESSED).formatted).toBe(
      'market survey, Research Data (2026).'
    );
  });
});

describe('isCitationStyle', () => {
  it('recognizes the supported styles', () => {
    expect(isCitationStyle('mla')).toBe(true);
    expect(isCitationStyle('harvard')).toBe(false);
  });
});
