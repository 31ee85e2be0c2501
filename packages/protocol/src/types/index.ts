// Re-export all protocol types

export * from './common.js';
export * from './uris.js';
export * from './people.js';
export * from './groups.js';
export * from './documents.js';
export * from './entities.js';
export * from './pages.js';
