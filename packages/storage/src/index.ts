export * from './queue-store.js';
export * from './jsonl-queue-store.js';
