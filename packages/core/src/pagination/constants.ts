/** Page number used when a query leaves it unset */
export const DEFAULT_PAGE = 1;

/** Page size used when a query leaves it unset */
export const DEFAULT_PAGE_SIZE = 10;

/** Largest page size a client may request */
export const MAX_PAGE_SIZE = 100;

/** Largest row offset a query may reach */
export const MAX_OFFSET = Number.MAX_SAFE_INTEGER;
