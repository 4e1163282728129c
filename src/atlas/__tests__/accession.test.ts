import { describe, it, expect } from 'vitest';
import {
  assignAccessions,
  formatAccession,
  parseAccession,
  sanitizePmid,
  sourceCode,
} from '../accession.js';

describe('sourceCode', () => {
  it.each([
    ['UniProt', 'U'],
    ['Non-UniProt', 'P'],
    ['Predicted', 'P'],
    ['OmniPath', 'O'],
    ['SIGNOR', 'S'],
    ['Signor', 'S'],
    ['TRRUST', 'T'],
    ['ORegAnno', 'R'],
    ['HTRIdb', 'H'],
    ['Reactome', 'R'],
    ['', 'X'],
    ['Unknown', 'X'],
  ])('%s -> %s', (source, code) => {
    expect(sourceCode(source)).toBe(code);
  });

  it('uses X when no source is recorded', () => {
    expect(sourceCode(null)).toBe('X');
  });
});

describe('sanitizePmid', () => {
  it('replaces placeholders with UNKNOWN', () => {
    for (const v of [null, undefined, '', ' ', '-', 'nan', 'None']) expect(sanitizePmid(v)).toBe('UNKNOWN');
  });

  it('keeps real identifiers', () => {
    expect(sanitizePmid(' 10022145 ')).toBe('10022145');
    expect(sanitizePmid(31)).toBe('31');
  });
});

describe('accession format', () => {
  it('formats and parses the same parts', () => {
    const parts = { prefix: 'SOORENA', sourceCode: 'U', pmid: '10022145', counter: 2 };
    expect(formatAccession(parts)).toBe('SOORENA-U-10022145-2');
    expect(parseAccession('SOORENA-U-10022145-2')).toEqual(parts);
    expect(parseAccession('SOORENA-X-UNKNOWN-1')).toEqual({ prefix: 'SOORENA', sourceCode: 'X', pmid: 'UNKNOWN', counter: 1 });
  });

  it.each([['SOORENA-U-10022145'], ['SOORENA-U-abc-1'], ['SOORENA-U-1-0'], ['SOORENA-UU-1-1'], ['']])(
    'rejects %j',
    ac => {
      expect(parseAccession(ac)).toBeNull();
    }
  );
});

describe('assignAccessions', () => {
  it('numbers records per source and publication', () => {
    const ids = assignAccessions([
      { pmid: '100', source: 'UniProt' },
      { pmid: '100', source: 'Non-UniProt' },
      { pmid: '100', source: 'UniProt' },
      { pmid: '200', source: 'UniProt' },
      { pmid: null, source: 'TRRUST' },
      { pmid: 'nan', source: 'TRRUST' },
    ]);
    expect(ids).toEqual([
      'SOORENA-U-100-1',
      'SOORENA-P-100-1',
      'SOORENA-U-100-2',
      'SOORENA-U-200-1',
      'SOORENA-T-UNKNOWN-1',
      'SOORENA-T-UNKNOWN-2',
    ]);
  });

  it('produces unique identifiers', () => {
    const rows = Array.from({ length: 50 }, (_, i) => ({ pmid: String(i % 7), source: i % 3 ? 'UniProt' : 'SIGNOR' }));
    const ids = assignAccessions(rows);
    expect(new Set(ids).size).toBe(rows.length);
  });

  it('honours a custom prefix', () => {
    expect(assignAccessions([{ pmid: '5', source: 'OmniPath' }], 'ATLAS')).toEqual(['ATLAS-O-5-1']);
  });
});
