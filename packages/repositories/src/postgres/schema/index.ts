// Re-export all schema tables
export * from './config-documents.js';
