import { describe, it, expect } from 'vitest';
import { CLAIM_RULES, findRule, ruleMatches, splitFragments } from '../src/claims/patterns';
import { ClaimType, type ClaimRule } from '../src/claims/types';

function matchesOf(ruleName: string, text: string): string[] {
  const rule = findRule(ruleName);
  if (!rule) throw new Error(`unknown rule ${ruleName}`);
  return splitFragments(text)
    .filter((f) => ruleMatches(rule, f.text))
    .map((f) => f.text);
}

describe('claim rules', () => {
  it('registers the rules in priority order', () => {
    expect(CLAIM_RULES.map((r) => [r.name, r.priority])).toEqual([
      ['growth_metrics', 1],
      ['financial_figures', 1],
      ['percentage_statistics', 1],
      ['market_data', 2],
      ['temporal_claims', 2],
      ['research_findings', 2],
      ['quantitative_claims', 3],
      ['comparative_claims', 3],
      ['expert_attributions', 3],
    ]);
  });

  it('returns undefined for an unknown rule', () => {
    expect(findRule('horoscopes')).toBeUndefined();
  });

  it('matches growth metrics with and without "by"', () => {
    expect(matchesOf('growth_metrics', 'Revenue grew by 40% last year.')).toEqual([
      'Revenue grew by 40% last year',
    ]);
    expect(matchesOf('growth_metrics', 'Costs fell 10 percent overall.')).toEqual([
      'Costs fell 10 percent overall',
    ]);
  });

  it('treats a period followed by a digit as a decimal point', () => {
    expect(matchesOf('growth_metrics', 'Output rose by 2.5% in March.')).toEqual([
      'Output rose by 2.5% in March',
    ]);
  });

  it('stops a fragment at a line break', () => {
    expect(matchesOf('growth_metrics', 'Costs fell 10%\nNext line here')).toEqual(['Costs fell 10%']);
  });

  it('matches financial figures with a scale word', () => {
    expect(matchesOf('financial_figures', 'The company raised $5.2 billion in funding.')).toEqual([
      'The company raised $5.2 billion in funding',
    ]);
  });

  it('matches percentages written as a word', () => {
    expect(matchesOf('percentage_statistics', 'Nearly 60 percent of teams work remotely.')).toEqual([
      'Nearly 60 percent of teams work remotely',
    ]);
  });

  it('matches market size statements', () => {
    expect(matchesOf('market_data', 'The market size reached $300 million.')).toEqual([
      'The market size reached $300 million',
    ]);
  });

  it('matches only twentieth and twenty-first century years', () => {
    expect(matchesOf('temporal_claims', 'The policy changed in 2021 for most teams.')).toEqual([
      'The policy changed in 2021 for most teams',
    ]);
    expect(matchesOf('temporal_claims', 'In 1850 the town was founded.')).toEqual([]);
  });

  it('matches research findings', () => {
    expect(
      matchesOf('research_findings', 'A recent study found that remote teams are happier.')
    ).toEqual(['A recent study found that remote teams are happier']);
  });

  it('matches quantitative claims with thousands separators', () => {
    expect(matchesOf('quantitative_claims', 'Over 5,000 customers switched providers.')).toEqual([
      'Over 5,000 customers switched providers',
    ]);
  });

  it('matches comparative claims', () => {
    expect(matchesOf('comparative_claims', 'The new engine is 3x faster than before.')).toEqual([
      'The new engine is 3x faster than before',
    ]);
  });

  it('matches comparison phrasing', () => {
    expect(
      matchesOf('comparative_claims', 'Compared to the 2022 baseline, tickets closed sooner.')
    ).toEqual(['Compared to the 2022 baseline, tickets closed sooner']);
    expect(matchesOf('comparative_claims', 'Plan A versus plan B. Costs were lower than forecast!')).toEqual([
      'Plan A versus plan B',
      ' Costs were lower than forecast',
    ]);
    expect(matchesOf('comparative_claims', 'The team shipped more features.')).toEqual([]);
  });

  it('matches attributions case-insensitively', () => {
    expect(matchesOf('expert_attributions', 'According to analysts, demand will rise!')).toEqual([
      'According to analysts, demand will rise',
    ]);
  });

  it('finds one fragment per sentence', () => {
    expect(
      matchesOf('percentage_statistics', 'Churn hit 4% in May. Then 6% in June. No data after.')
    ).toEqual(['Churn hit 4% in May', ' Then 6% in June']);
  });

  it('splits fragments with document offsets', () => {
    expect(splitFragments('Up 2.5% today! Down\nagain?')).toEqual([
      { text: 'Up 2.5% today', start: 0 },
      { text: ' Down', start: 14 },
      { text: 'again', start: 20 },
    ]);
  });

  it('ignores the global flag on custom rule patterns', () => {
    const rule: ClaimRule = {
      name: 'sales_growth',
      type: ClaimType.GROWTH,
      priority: 1,
      description: 'Sales growth',
      pattern: /grew/gi,
    };
    expect(ruleMatches(rule, 'Sales grew fast')).toBe(true);
    expect(ruleMatches(rule, 'Sales grew fast')).toBe(true);
  });
});
