/**
 * Threadlens - Shared Types
 * Wire types of the Query API, consumed by the backend and by front ends
 */

export * from './types/api.js';
export * from './types/query.js';
