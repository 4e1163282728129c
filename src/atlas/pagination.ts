// src/atlas/pagination.ts
import { PAGE_SIZE_OPTIONS, isPageSize } from "./config.js";
import type { PageState } from "./types.js";

export function maxPage(totalCount: number, pageSize: number): number {
  return Math.max(1, Math.ceil(Math.max(0, totalCount) / pageSize));
}

function clampPage(page: number, totalCount: number, pageSize: number): number {
  return Math.min(Math.max(1, Math.trunc(page)), maxPage(totalCount, pageSize));
}

export function initialPageState(pageSize: number = 50): PageState {
  if (!isPageSize(pageSize)) {
    throw new Error(`page size must be one of ${PAGE_SIZE_OPTIONS.join(", ")}, got ${pageSize}`);
  }
  return Object.freeze({ page: 1, pageSize, totalCount: 0 });
}

/** No-op on the last page. */
export function nextPage(state: PageState): PageState {
  if (state.page >= maxPage(state.totalCount, state.pageSize)) return state;
  return Object.freeze({ ...state, page: state.page + 1 });
}

/** No-op on the first page. */
export function previousPage(state: PageState): PageState {
  if (state.page <= 1) return state;
  return Object.freeze({ ...state, page: state.page - 1 });
}

export function resetPage(state: PageState): PageState {
  if (state.page === 1) return state;
  return Object.freeze({ ...state, page: 1 });
}

/** Changing the size goes back to page 1; the count is kept so next() stays bounded. */
export function setPageSize(state: PageState, pageSize: number): PageState {
  if (!isPageSize(pageSize)) {
    throw new Error(`page size must be one of ${PAGE_SIZE_OPTIONS.join(", ")}, got ${pageSize}`);
  }
  return Object.freeze({ page: 1, pageSize, totalCount: state.totalCount });
}

/** Record a fresh count and pull the page back inside [1, maxPage]. */
export function reconcile(state: PageState, totalCount: number): PageState {
  const page = clampPage(state.page, totalCount, state.pageSize);
  if (page === state.page && totalCount === state.totalCount) return state;
  return Object.freeze({ page, pageSize: state.pageSize, totalCount });
}

export function pageOffset(state: PageState): number {
  return (state.page - 1) * state.pageSize;
}

export function pageStatus(state: PageState): string {
  return `Page ${state.page} of ${maxPage(state.totalCount, state.pageSize)}`;
}
