/**
 * Shared Type Definitions
 */

// =============================================================================
// Request Context
// =============================================================================

/**
 * What the HTTP layer knows about the caller of a redirect
 */
export interface ClientInfo {
  ip: string;
  userAgent: string | null;
  referer: string | null;
}

// =============================================================================
// API Response Types
// =============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface PaginatedResponse<T> {
  items: T[];
  pagination: {
    page: number;
    pageSize: number;
    totalItems: number;
    totalPages: number;
    hasMore: boolean;
  };
}

// =============================================================================
// Time
// =============================================================================

/** Milliseconds since the epoch; injected so stores and resolvers can be tested with a fixed clock */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
