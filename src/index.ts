// Public API
export * from '@/domain/quiz';
export * from '@/domain/grading';
export * from '@/domain/history';
export * from '@/domain/scheduling';
export * from '@/domain/session';
export type { IResultHistory, IStorageAdapter } from '@/ports';
export { InMemoryStorageAdapter } from '@/adapters/mock';
export { FileStorageAdapter } from '@/adapters/filesystem/FileStorageAdapter';
