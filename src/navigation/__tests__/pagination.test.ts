/**
 * Tests for pagination helpers
 */

import { describe, it, expect } from 'vitest';
import { calculatePageBounds, calculateTotalPages, pageLength } from '../pagination.js';

describe('calculateTotalPages', () => {
  it('rounds up partial pages', () => {
    expect(calculateTotalPages(5, 2)).toBe(3);
    expect(calculateTotalPages(4, 2)).toBe(2);
    expect(calculateTotalPages(1, 10)).toBe(1);
  });

  it('has one page for an empty list', () => {
    expect(calculateTotalPages(0, 10)).toBe(1);
  });

  it('has one page for a non-positive page size', () => {
    expect(calculateTotalPages(5, 0)).toBe(1);
  });
});

describe('calculatePageBounds', () => {
  it('covers every item exactly once', () => {
    expect(calculatePageBounds(0, 2, 5)).toEqual({ start: 0, end: 2 });
    expect(calculatePageBounds(1, 2, 5)).toEqual({ start: 2, end: 4 });
    expect(calculatePageBounds(2, 2, 5)).toEqual({ start: 4, end: 5 });
  });

  it('is empty past the last page', () => {
    const bounds = calculatePageBounds(3, 2, 5);
    expect(bounds).toEqual({ start: 6, end: 6 });
    expect(pageLength(bounds)).toBe(0);
  });

  it('is empty for an empty list', () => {
    expect(calculatePageBounds(0, 10, 0)).toEqual({ start: 0, end: 0 });
  });
});
