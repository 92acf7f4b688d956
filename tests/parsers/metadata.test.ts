import { describe, it, expect } from 'vitest';
import { detectBenchmarkMetadata } from '@cisbench/cis-parser';
import { COVER_PAGE, TERMS_PAGE, createMockPDF } from '../fixtures/benchmark.js';

describe('detectBenchmarkMetadata', () => {
  it('should detect title and version from the cover page', () => {
    const pdf = createMockPDF([COVER_PAGE, TERMS_PAGE]);

    expect(detectBenchmarkMetadata(pdf, 5)).toEqual({
      title: 'CIS Ubuntu Linux 22.04 LTS Benchmark',
      version: 'v1.0.0',
    });
  });

  it('should match the title case-insensitively', () => {
    const pdf = createMockPDF(['cis Debian Family Linux BENCHMARK']);

    expect(detectBenchmarkMetadata(pdf, 5).title).toBe('CIS Debian Family Linux Benchmark');
  });

  it('should detect title and version on different pages', () => {
    const pdf = createMockPDF(['CIS Microsoft Windows 11 Benchmark', TERMS_PAGE, 'Version v3.0.0']);

    expect(detectBenchmarkMetadata(pdf, 5)).toEqual({
      title: 'CIS Microsoft Windows 11 Benchmark',
      version: 'v3.0.0',
    });
  });

  it('should let a later page override an earlier one', () => {
    const pdf = createMockPDF(['CIS Old Benchmark v1.0.0', 'CIS New Benchmark v2.1.0']);

    expect(detectBenchmarkMetadata(pdf, 5)).toEqual({
      title: 'CIS New Benchmark',
      version: 'v2.1.0',
    });
  });

  it('should only scan the first pages', () => {
    const pdf = createMockPDF([TERMS_PAGE, TERMS_PAGE, COVER_PAGE]);

    expect(detectBenchmarkMetadata(pdf, 2)).toEqual({ title: '', version: '' });
  });

  it('should return empty values when nothing matches', () => {
    expect(detectBenchmarkMetadata(createMockPDF([]), 5)).toEqual({ title: '', version: '' });
  });
});
