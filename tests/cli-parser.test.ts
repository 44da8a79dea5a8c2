import { describe, it, expect } from 'vitest';
import { parseCiteOptions, parseVerifyOptions } from '../src/boundaries/cli-parser';
import { OutputFormat } from '../src/cli/types';
import { ValidationError } from '../src/errors/index';

describe('parseCiteOptions', () => {
  it('applies defaults', () => {
    expect(parseCiteOptions({ research: 'research.json' })).toEqual({
      verbose: false,
      output: OutputFormat.Line,
      research: 'research.json',
      style: 'apa',
    });
  });

  it('rejects unknown citation styles', () => {
    expect(() => parseCiteOptions({ research: 'research.json', style: 'harvard' })).toThrow(
      ValidationError
    );
  });

  it('requires a research file', () => {
    expect(() => parseCiteOptions({})).toThrow(/research/);
  });
});

describe('parseVerifyOptions', () => {
  it('coerces the accuracy gate', () => {
    const options = parseVerifyOptions({ research: 'r.json', failUnder: '0.8', output: 'json' });

    expect(options.failUnder).toBe(0.8);
    expect(options.output).toBe(OutputFormat.Json);
  });

  it('rejects a gate outside 0..1', () => {
    expect(() => parseVerifyOptions({ research: 'r.json', failUnder: '80' })).toThrow(ValidationError);
  });

  it('rejects unknown output formats', () => {
    expect(() => parseVerifyOptions({ research: 'r.json', output: 'xml' })).toThrow(ValidationError);
  });
});
