import { describe, it, expect } from 'vitest';
import {
  initialPageState,
  maxPage,
  nextPage,
  pageOffset,
  pageStatus,
  previousPage,
  reconcile,
  resetPage,
  setPageSize,
} from '../pagination.js';

describe('pagination', () => {
  it('starts on page 1 with nothing counted', () => {
    expect(initialPageState()).toEqual({ page: 1, pageSize: 50, totalCount: 0 });
    expect(initialPageState(25)).toEqual({ page: 1, pageSize: 25, totalCount: 0 });
  });

  it('rejects sizes outside the enumeration', () => {
    expect(() => initialPageState(30)).toThrow('page size must be one of 25, 50, 100, got 30');
    expect(() => setPageSize(initialPageState(), 0)).toThrow();
  });

  it('has at least one page', () => {
    expect(maxPage(0, 25)).toBe(1);
    expect(maxPage(25, 25)).toBe(1);
    expect(maxPage(26, 25)).toBe(2);
    expect(maxPage(60, 25)).toBe(3);
  });

  it('stops at the last page', () => {
    let s = reconcile(initialPageState(25), 60);
    s = nextPage(nextPage(s));
    expect(s.page).toBe(3);
    expect(nextPage(s)).toBe(s);
  });

  it('stops at the first page', () => {
    const s = reconcile(initialPageState(25), 60);
    expect(previousPage(s)).toBe(s);
    expect(previousPage(nextPage(s)).page).toBe(1);
  });

  it('does not advance while the count is empty', () => {
    const s = initialPageState();
    expect(nextPage(s)).toBe(s);
  });

  it('resets to page 1', () => {
    const s = nextPage(reconcile(initialPageState(25), 60));
    expect(resetPage(s)).toEqual({ page: 1, pageSize: 25, totalCount: 60 });
  });

  it('goes back to page 1 on a size change but keeps the count', () => {
    const s = nextPage(nextPage(reconcile(initialPageState(25), 60)));
    expect(setPageSize(s, 100)).toEqual({ page: 1, pageSize: 100, totalCount: 60 });
  });

  it('clamps the page when the count shrinks', () => {
    const s = nextPage(nextPage(reconcile(initialPageState(25), 60)));
    expect(reconcile(s, 30)).toEqual({ page: 2, pageSize: 25, totalCount: 30 });
    expect(reconcile(s, 0)).toEqual({ page: 1, pageSize: 25, totalCount: 0 });
  });

  it('keeps the same state object when nothing changes', () => {
    const s = reconcile(initialPageState(25), 60);
    expect(reconcile(s, 60)).toBe(s);
  });

  it('returns frozen states', () => {
    expect(Object.isFrozen(nextPage(reconcile(initialPageState(25), 60)))).toBe(true);
  });

  it('computes offsets and status text', () => {
    const s = nextPage(nextPage(reconcile(initialPageState(25), 60)));
    expect(pageOffset(s)).toBe(50);
    expect(pageStatus(s)).toBe('Page 3 of 3');
    expect(pageStatus(initialPageState())).toBe('Page 1 of 1');
  });
});
